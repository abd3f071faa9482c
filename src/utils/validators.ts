import { HttpError } from "./errors";

export function parseNumber(v: unknown): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

/** Single-valued query string param; repeated params are rejected. */
export function parseQueryString(v: unknown, name: string): string | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "string") return v;
  throw new HttpError(400, `Query parameter '${name}' must be given once`);
}
