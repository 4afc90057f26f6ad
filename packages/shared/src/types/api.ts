export type ApiError = {
  error: string;
  code: string;
  detail?: Record<string, string[] | undefined> | string;
  requestId?: string;
};
