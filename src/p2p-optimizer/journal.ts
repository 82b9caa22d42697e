/**
 * Undo steps for the in-place changes one operation makes to long-lived structures. Rolling back
 * replays them newest first, which puts the structures back exactly as they were.
 */
export class Journal {
  private readonly undos: (() => void)[] = [];

  get length() {
    return this.undos.length;
  }

  record(undo: () => void) {
    this.undos.push(undo);
  }

  rollback() {
    for (let undo = this.undos.pop(); undo; undo = this.undos.pop()) undo();
  }
}
