import { handleReleasedError } from "../errors";

/**
 * Reference-counted ownership of one value. Every holder (the scope that
 * created it, each snapshot capturing it) owns exactly one count.
 */
export class SharedHandle<T> {
  private refs = 1;
  private readonly slot: { readonly value: T };
  private readonly onLastRelease?: () => void;

  constructor(value: T, readonly label: string, dispose?: (value: T) => void) {
    this.slot = { value };
    this.onLastRelease = dispose ? () => dispose(value) : undefined;
  }

  get value(): T {
    this.assertAlive("read");
    return this.slot.value;
  }

  get refCount(): number {
    return this.refs;
  }

  get released(): boolean {
    return this.refs === 0;
  }

  /**
   * Adds a holder. Returns this very handle: sharing never copies the value.
   */
  retain(): this {
    this.assertAlive("retain");
    this.refs++;
    return this;
  }

  release(): void {
    this.assertAlive("release");
    this.refs--;
    if (this.refs === 0) {
      this.onLastRelease?.();
    }
  }

  private assertAlive(operation: string) {
    if (this.refs === 0) {
      handleReleasedError.throw({ local: this.label, operation });
    }
  }
}
