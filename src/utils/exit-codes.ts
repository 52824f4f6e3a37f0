// Semantic exit codes for CLI
export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;          // One or more keys could not be added
export const EXIT_USER_ERROR = 2;     // Invalid flags
export const EXIT_CONFIG_ERROR = 3;   // Config file missing or invalid
export const EXIT_MAPPING_ERROR = 4;  // Mapping file unreadable
export const EXIT_INTERRUPTED = 130;  // SIGINT / SIGTERM
