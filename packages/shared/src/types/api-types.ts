/** Standard API success response wrapper */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/** Standard API error response */
export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface Pagination {
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

/** Offset-paginated result; `page` is 0-based */
export interface PaginatedResult<T> {
  items: T[];
  pagination: Pagination;
}
