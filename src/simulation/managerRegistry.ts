import { utils } from "ethers";

import { PermissionLayer } from "../p2p-optimizer/collaborators";

/** Who may borrow and withdraw on behalf of whom. */
export class ManagerRegistry implements PermissionLayer {
  private readonly approvals = new Map<string, Set<string>>();

  approveManager(owner: string, manager: string, isAllowed: boolean) {
    owner = utils.getAddress(owner);
    manager = utils.getAddress(manager);

    let managers = this.approvals.get(owner);
    if (!managers) {
      managers = new Set();
      this.approvals.set(owner, managers);
    }

    if (isAllowed) managers.add(manager);
    else managers.delete(manager);
  }

  isManagedBy(owner: string, manager: string) {
    return this.approvals.get(utils.getAddress(owner))?.has(utils.getAddress(manager)) ?? false;
  }
}
