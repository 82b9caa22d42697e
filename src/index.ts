export * from "./config";
export * from "./logger";

export * from "./p2p-optimizer/collaborators";
export * from "./p2p-optimizer/constants";
export * from "./p2p-optimizer/errors";
export * from "./p2p-optimizer/events";
export * from "./p2p-optimizer/lens";
export * from "./p2p-optimizer/optimizer";
export * from "./p2p-optimizer/types";
export { RankingHeap } from "./p2p-optimizer/ranking";
export { MarketBalances } from "./p2p-optimizer/marketBalances";

export * from "./simulation/inMemoryPool";
export * from "./simulation/managerRegistry";
export * from "./simulation/staticOracle";
