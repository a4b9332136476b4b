export type LogContext = {
  entityType?: string;
  entityId?: string | number | null;
  userId?: number | null;
  message?: string;
};

/**
 * Logs server errors with structured context before a handler answers with a generic `internal` error.
 */
export function logServerError(context: LogContext, error: unknown) {
  const { entityType = "server", entityId, userId, message = "Unexpected error" } = context;
  const errorMessage = error instanceof Error ? error.message : String(error);

  console.error(
    `[${entityType}] ${message}`,
    {
      entityType,
      entityId,
      userId,
      error: errorMessage,
    }
  );
}
