export type KubeErrorKind = 'not-found' | 'conflict' | 'transient';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a failed API call. The 1.x client throws `ApiException`
 * with `code`; older shapes carry `statusCode` or `response.statusCode`.
 */
export function getKubeStatusCode(error: unknown): number | null {
  if (!isRecord(error)) return null;
  if (typeof error.code === 'number') return error.code;
  if (typeof error.statusCode === 'number') return error.statusCode;
  const response = error.response;
  if (isRecord(response) && typeof response.statusCode === 'number') return response.statusCode;
  return null;
}

export function classifyKubeError(error: unknown): KubeErrorKind {
  switch (getKubeStatusCode(error)) {
    case 404:
      return 'not-found';
    case 409:
      return 'conflict';
    default:
      return 'transient';
  }
}

export function isNotFound(error: unknown): boolean {
  return classifyKubeError(error) === 'not-found';
}

export function formatKubeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const status = getKubeStatusCode(error);
  if (status) return `${error.message} (status=${status})`;
  return error.message;
}
