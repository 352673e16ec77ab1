export const DEFAULT_LOG_LEVEL = "info";
export const TEST_LOG_LEVEL = "silent";
export const STDERR_FD = 2;
