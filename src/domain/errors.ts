export class CollaboratorUnavailableError extends Error {
  constructor(
    readonly collaborator: "summary_index" | "embeddings" | "answer_generator",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollaboratorUnavailableError";
  }
}

export type LoadErrorKind = "missing" | "unreadable" | "invalid";

export interface LoadError {
  artifact: string;
  kind: LoadErrorKind;
  message: string;
}

export class MalformedItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedItemError";
  }
}
