export interface ApiListResponse<T> {
  data: T[];
  requestId?: string;
}

export interface HealthStatus {
  status: "ok" | "error";
  service: string;
  timestamp: string;
  details?: Record<string, unknown>;
}
