/**
 * Proof of admission to one of the lock's lanes. Releasing it is the only
 * way to open the lane for the next waiter.
 */
export class ReaderWriterLockTicket {
  private released = false;

  constructor(
    readonly id: number,
    readonly isExclusive: boolean,
    private readonly onRelease: () => void
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }
}
