export type RemoteRecord = Record<string, unknown>;

export type FilterValue = string | number | boolean;

export type Filters = Record<string, FilterValue>;

export type PageRequest = {
  category: string;
  filters: Filters;
  offset: number;
  limit: number;
};

export type PageResponse = {
  records: RemoteRecord[];
  // undefined when the remote sent no usable quota hint
  remainingQuota: number | undefined;
  total?: number;
};

export type WriteMethod = "POST" | "PUT" | "DELETE";

export type RemoteApi = {
  listPage: (request: PageRequest, signal?: AbortSignal) => Promise<PageResponse>;
  send: (
    method: WriteMethod,
    category: string,
    id?: string,
    body?: RemoteRecord,
  ) => Promise<RemoteRecord>;
};

export function normalizeCategory(category: string): string {
  return category.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}
