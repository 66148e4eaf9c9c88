/** OpenAI-compatible error body returned by every gateway route. */
export interface GatewayErrorResponse {
  error: {
    message: string;
    type: string;
    param?: string | null;
    code: string | null;
  };
}
