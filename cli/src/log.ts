export function log(message: string): void {
  // Only log if COMMIT_GRAMMAR_DEBUG is set
  if (process.env.COMMIT_GRAMMAR_DEBUG) {
    console.error(`[commit-grammar] ${message}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
