/** Errors raised while talking to the inference backend. */

/** The backend answered a request with a non-success status. */
export class ComfyApiError extends Error {
  readonly status: number;
  readonly responseBody: string;
  /** Per-node validation errors from a rejected prompt, when the backend sent them. */
  readonly nodeErrors: Record<string, unknown>;

  constructor(status: number, responseBody: string, message?: string) {
    const parsed = parseErrorBody(responseBody);
    super(message ?? parsed.message ?? `Inference backend returned HTTP ${status}`);
    this.name = 'ComfyApiError';
    this.status = status;
    this.responseBody = responseBody;
    this.nodeErrors = parsed.nodeErrors;
  }
}

/** The backend accepted a prompt but failed or was interrupted while running it. */
export class ComfyExecutionError extends Error {
  constructor(
    readonly promptId: string,
    message: string,
    readonly nodeName: string | null = null,
  ) {
    super(message);
    this.name = 'ComfyExecutionError';
  }
}

export class ClientNotConnectedError extends Error {
  constructor(message = 'Inference client is not connected') {
    super(message);
    this.name = 'ClientNotConnectedError';
  }
}

interface ParsedErrorBody {
  message: string | null;
  nodeErrors: Record<string, unknown>;
}

function parseErrorBody(body: string): ParsedErrorBody {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { message: body.trim() || null, nodeErrors: {} };
  }
  if (!isRecord(json)) return { message: null, nodeErrors: {} };

  const error = json.error;
  let message: string | null = null;
  if (typeof error === 'string') {
    message = error;
  } else if (isRecord(error) && typeof error.message === 'string') {
    message = typeof error.details === 'string' && error.details
      ? `${error.message}: ${error.details}`
      : error.message;
  }
  const nodeErrors = isRecord(json.node_errors) ? json.node_errors : {};
  return { message, nodeErrors };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
