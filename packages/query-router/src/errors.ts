export type RouterErrorCode =
  | "INVALID_INPUT"
  | "CONFIG_ERROR"
  | "UPSTREAM_ERROR"
  | "ROUTING_EXHAUSTED";

export type UpstreamDependency = "classifier" | "general" | "platform_fallback";

export class RouterError extends Error {
  readonly code: RouterErrorCode;
  readonly status: number;

  constructor(code: RouterErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RouterError";
    this.code = code;
    this.status = status;
  }
}

export class InvalidInputError extends RouterError {
  constructor(message: string) {
    super("INVALID_INPUT", 400, message);
    this.name = "InvalidInputError";
  }
}

export class ConfigError extends RouterError {
  constructor(message: string) {
    super("CONFIG_ERROR", 500, message);
    this.name = "ConfigError";
  }
}

const dependencyLabels: Record<UpstreamDependency, string> = {
  classifier: "Classifier",
  general: "Video search",
  platform_fallback: "Platform search fallback",
};

export class UpstreamError extends RouterError {
  readonly dependency: UpstreamDependency;

  constructor(dependency: UpstreamDependency, cause: unknown) {
    super("UPSTREAM_ERROR", 502, `${dependencyLabels[dependency]} error: ${describeError(cause)}`, { cause });
    this.name = "UpstreamError";
    this.dependency = dependency;
  }
}

export class RoutingExhaustedError extends RouterError {
  constructor(message = "Unable to determine search method; try rephrasing") {
    super("ROUTING_EXHAUSTED", 422, message);
    this.name = "RoutingExhaustedError";
  }
}

export function isRouterError(err: unknown): err is RouterError {
  return err instanceof RouterError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
