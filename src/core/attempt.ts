// src/core/attempt.ts

export type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run a best-effort step. The failure is handed back as a value so the
 * caller decides whether to log it, stop a loop, or carry on.
 */
export async function attempt<T>(step: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, error };
  }
}
