export type ServiceName = "chat" | "speech";

// "status": the service answered with something other than 200.
// "malformed": the body could not be read as the expected shape.
export type ServiceErrorKind = "status" | "malformed";

export class ServiceError extends Error {
  readonly service: ServiceName;
  readonly kind: ServiceErrorKind;
  readonly status: number | null;

  constructor(service: ServiceName, kind: ServiceErrorKind, message: string, status: number | null = null) {
    super(`${service} service: ${message}`);
    this.name = "ServiceError";
    this.service = service;
    this.kind = kind;
    this.status = status;
  }
}
