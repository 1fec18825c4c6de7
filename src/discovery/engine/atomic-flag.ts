/**
 * Monotonic boolean with compare-and-set
 *
 * Readable from anywhere without going through the serial executor.
 */
export class AtomicFlag {
  private value = false;

  get isSet(): boolean {
    return this.value;
  }

  /**
   * Flip false -> true
   *
   * @returns true only for the caller that performed the flip
   */
  trySet(): boolean {
    if (this.value) {
      return false;
    }
    this.value = true;
    return true;
  }
}
