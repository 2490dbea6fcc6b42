/**
 * API request and response types
 */

// Success response wrapper
export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
}

// Error response wrapper
export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
}
