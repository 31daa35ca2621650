export interface DatabaseProbePort {
  /** True when a connection string is configured at all. */
  isConfigured(): boolean;
  /** Opens a connection and returns the current database name. */
  connect(): Promise<string>;
  listCollections(limit: number): Promise<string[]>;
}
