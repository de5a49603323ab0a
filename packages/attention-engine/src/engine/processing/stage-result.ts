export type EngineStage =
  | "eye-regions"
  | "pupils"
  | "blink"
  | "gaze"
  | "movement"
  | "scoring";

export class EngineStageError extends Error {
  readonly stage: EngineStage;

  constructor(stage: EngineStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage "${stage}" failed: ${detail}`, { cause });
    this.name = "EngineStageError";
    this.stage = stage;
  }
}

export type StageFailure = {
  ok: false;
  stage: EngineStage;
  error: EngineStageError;
};

export type StageResult<T> = { ok: true; value: T } | StageFailure;

export const runStage = <T>(
  stage: EngineStage,
  compute: () => T,
): StageResult<T> => {
  try {
    return { ok: true, value: compute() };
  } catch (error) {
    return { ok: false, stage, error: new EngineStageError(stage, error) };
  }
};
