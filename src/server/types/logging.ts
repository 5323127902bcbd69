// Request metadata attached by middleware
export interface RequestMetadata {
  request_id: string;
  ip_address: string;
  user_agent: string;
  started_at: number;
}
