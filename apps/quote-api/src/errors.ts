// ─── HTTP Errors ──────────────────────────────────────────
// Anything extending HttpError is answered with its own status and
// message. Everything else becomes a 500 in the error handler.
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class TagNotFoundError extends NotFoundError {
  constructor(readonly tag: string) {
    super(`No quotes found with tag '${tag}'`);
  }
}

// Bad seed data. Raised while booting, never sent to a client.
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
