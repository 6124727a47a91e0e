import type { Request } from "express";

const DEFAULT_PAGE = 50;
const MAX_PAGE = 200;

export function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Non-negative safe integer from the query, or `fallback` for anything else. */
function queryInteger(req: Request, key: string, fallback: number): number {
  const raw = queryString(req, key);
  if (raw === undefined || !/^\d+$/.test(raw)) return fallback;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : fallback;
}

export function pageQuery(req: Request): { limit: number; offset: number } {
  const limit = queryInteger(req, "limit", DEFAULT_PAGE);
  return {
    limit: Math.min(Math.max(limit, 1), MAX_PAGE),
    offset: queryInteger(req, "offset", 0),
  };
}
