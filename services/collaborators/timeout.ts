import { CollaboratorError, CollaboratorErrorCode } from "./errors.js";

/**
 * Race a collaborator call against a wall-clock budget. Exceeding the budget
 * rejects with a TIMEOUT CollaboratorError; the timer is always cleared.
 */
export async function withTimeout<T>(
  collaborator: string,
  budgetMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new CollaboratorError(collaborator, CollaboratorErrorCode.TIMEOUT, `${collaborator} did not answer within ${budgetMs}ms`)
      );
    }, budgetMs);
  });
  try {
    return await Promise.race([call(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
