// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Transaction identifiers are a strictly increasing integer sequence.
 */
export type TransactionId = number;

/**
 * Lowercase hex-encoded SHA-256 digest (64 characters)
 */
export type ContentHash = string;

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Pagination for list operations
 */
export type PageOptions = {
  /**
   * Maximum number of results (default depends on the operation)
   */
  limit?: number;

  /**
   * Number of results to skip
   */
  offset?: number;
};
