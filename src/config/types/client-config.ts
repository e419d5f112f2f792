export interface ClientConfig {
  name: string;
  latency_ms: number;
  error_rate: number;
  pool_size: number;
  acquire_timeout_ms: number;
}

export interface ClientsConfig {
  primary: ClientConfig;
  secondary: ClientConfig;
}
