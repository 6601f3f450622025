// Main client export
export { ResyClient, type ResyClientConfig, type BookingApi } from "./client";

// Error exports
export { RemoteCallError, ResyAPIError } from "./errors";

// Schema exports
export * from "./schemas";

// Utility exports
export * from "./utils/schema-utils";
