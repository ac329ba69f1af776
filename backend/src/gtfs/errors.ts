const BODY_PREVIEW_LENGTH = 180;

export class FetchError extends Error {
  readonly status: number | null;
  readonly url: string;
  readonly body: string;

  constructor(url: string, status: number | null, message: string, body = "") {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
    this.body = body.slice(0, BODY_PREVIEW_LENGTH);
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export const safeErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message;
  return JSON.stringify(error);
};
