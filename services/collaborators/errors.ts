// ─── Collaborator errors ────────────────────────────────────────────────────

export const CollaboratorErrorCode = {
  NOT_CONFIGURED: "NOT_CONFIGURED",
  TIMEOUT: "TIMEOUT",
  HTTP_ERROR: "HTTP_ERROR",
  MALFORMED_RESPONSE: "MALFORMED_RESPONSE",
  UNREACHABLE: "UNREACHABLE",
} as const;

export type CollaboratorErrorCode =
  (typeof CollaboratorErrorCode)[keyof typeof CollaboratorErrorCode];

export class CollaboratorError extends Error {
  readonly code: CollaboratorErrorCode;
  readonly collaborator: string;

  constructor(collaborator: string, code: CollaboratorErrorCode, message: string) {
    super(message);
    this.name = "CollaboratorError";
    this.code = code;
    this.collaborator = collaborator;
    Object.setPrototypeOf(this, CollaboratorError.prototype);
  }
}

/** Message of any thrown value, for warnings and degraded records. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
