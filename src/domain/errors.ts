export type StoreStage = "summaries" | "chunks";

export class StoreUnavailableError extends Error {
  readonly stage: StoreStage;

  constructor(stage: StoreStage, cause: unknown) {
    super(
      `Guideline store unavailable during ${stage} search: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "StoreUnavailableError";
    this.stage = stage;
  }
}

export class InvalidSearchInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSearchInputError";
  }
}
