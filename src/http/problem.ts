import type { FieldError } from "../core/index.js";

export type { FieldError };

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "INVALID_JSON"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "UNPROCESSABLE_ENTITY"
  | "PAYLOAD_TOO_LARGE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL";

export function problem(params: {
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  errors?: FieldError[];
  requestId?: string;
}): Problem {
  const type = `https://errors.lexindex.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_JSON":
      return "Malformed JSON body";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "UNPROCESSABLE_ENTITY":
      return "Unprocessable entity";
    case "PAYLOAD_TOO_LARGE":
      return "Payload too large";
    case "NOT_FOUND":
      return "Not found";
    case "METHOD_NOT_ALLOWED":
      return "Method not allowed";
    case "INTERNAL":
      return "Internal error";
  }
}
