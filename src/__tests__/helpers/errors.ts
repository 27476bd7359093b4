import { StitchError } from "../../errors.js";

/** Awaits a promise that must reject with a StitchError and returns it. */
export async function stitchErrorFrom(promise: Promise<unknown>): Promise<StitchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof StitchError) return error;
    throw error;
  }
  throw new Error("Expected the promise to reject");
}

export function stitchErrorFromSync(fn: () => unknown): StitchError {
  try {
    fn();
  } catch (error) {
    if (error instanceof StitchError) return error;
    throw error;
  }
  throw new Error("Expected the call to throw");
}
