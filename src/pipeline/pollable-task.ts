export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * A started computation that can be checked without waiting. The outcome is
 * handed out exactly once.
 */
export class PollableTask<T> {
  private outcome: TaskOutcome<T> | null = null;
  private taken = false;

  constructor(promise: Promise<T>) {
    void promise.then(
      (value) => {
        this.outcome = { ok: true, value };
      },
      (error: unknown) => {
        this.outcome = { ok: false, error };
      }
    );
  }

  get isFinished(): boolean {
    return this.outcome !== null;
  }

  pollOnce(): TaskOutcome<T> | undefined {
    if (!this.outcome || this.taken) {
      return undefined;
    }
    this.taken = true;
    return this.outcome;
  }
}

export type TaskSpawner = <T>(job: () => Promise<T>) => PollableTask<T>;

/** Starts `job` on a later turn of the event loop; the caller returns at once. */
export const spawnDeferred: TaskSpawner = <T>(job: () => Promise<T>): PollableTask<T> =>
  new PollableTask(
    new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        void Promise.resolve().then(job).then(resolve, reject);
      });
    })
  );
