/**
 * Options controlling how withCallTracing reports operation calls
 */
export interface TracingOptions {
  /**
   * Level used for the entry written on every successful call
   * Failures are always logged at "error"
   * Default: "debug"
   */
  level?: "debug" | "info";

  /**
   * Operations never logged, matched by name
   * Examples: ["toInt", "isMoney"]
   * Default: []
   */
  silentOperations?: string[];

  /**
   * Whether to include the call arguments in the log entry
   * Default: false
   */
  logArguments?: boolean;
}
