import type { Filter, FindOptions, Repository, Stored } from "../store/types.js";

export type ListLimits = {
  defaultLimit: number;
  maxLimit: number;
};

/** Inventory and catalog listings. */
export const catalogLimits: ListLimits = { defaultLimit: 100, maxLimit: 500 };
/** Append-mostly history: audit entries, warnings, check-ins, users. */
export const historyLimits: ListLimits = { defaultLimit: 50, maxLimit: 200 };

export type Pagination = {
  page: number;
  limit: number;
  skip: number;
};

export type Page<T> = {
  items: T[];
  page: number;
  limit: number;
  hasMore: boolean;
};

function parsePositiveInt(raw: unknown): number | null {
  if (typeof raw !== "string") return null;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) return null;
  return n;
}

/** `?page=&limit=`; out-of-range or malformed values fall back to page 1 and the default limit. */
export function getPagination(query: Record<string, unknown>, limits: ListLimits): Pagination {
  const page = parsePositiveInt(query.page) ?? 1;
  const limit = Math.min(limits.maxLimit, parsePositiveInt(query.limit) ?? limits.defaultLimit);
  return { page, limit, skip: (page - 1) * limit };
}

/** One page of `repo`, fetching a single extra row to learn whether another page follows. */
export async function listPage<D>(
  repo: Repository<D>,
  query: Record<string, unknown>,
  filter: Filter<D>,
  sort: FindOptions<D>["sort"],
  limits: ListLimits
): Promise<Page<Stored<D>>> {
  const { page, limit, skip } = getPagination(query, limits);
  const rows = await repo.find(filter, { sort, skip, limit: limit + 1 });
  return { items: rows.slice(0, limit), page, limit, hasMore: rows.length > limit };
}
