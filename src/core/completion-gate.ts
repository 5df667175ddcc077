export type GateOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * A set-once slot shared between a callback tool and the session waiting on it.
 *
 * Only the first `trySet` or `trySetFault` takes effect. `promise` never rejects.
 */
export class CompletionGate<T> {
  readonly promise: Promise<GateOutcome<T>>;
  #resolve: (outcome: GateOutcome<T>) => void = () => undefined;
  #outcome: GateOutcome<T> | undefined;

  constructor() {
    this.promise = new Promise<GateOutcome<T>>((resolve) => {
      this.#resolve = resolve;
    });
  }

  get isSettled(): boolean {
    return this.#outcome !== undefined;
  }

  get outcome(): GateOutcome<T> | undefined {
    return this.#outcome;
  }

  trySet(value: T): boolean {
    return this.#settle({ ok: true, value });
  }

  trySetFault(error: Error): boolean {
    return this.#settle({ ok: false, error });
  }

  #settle(outcome: GateOutcome<T>): boolean {
    if (this.#outcome) {
      return false;
    }
    this.#outcome = outcome;
    this.#resolve(outcome);
    return true;
  }
}
