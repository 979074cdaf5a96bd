// Request/record validation and engine configuration schemas shared by the
// server and the ingest poller.

export * from './schemas/index.js'
