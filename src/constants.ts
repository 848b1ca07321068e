export const VERSION = "0.1.0";

/** Secret share path; created when missing. */
export const DEFAULT_SECRET_PATH = "secret.png";

export const DEFAULT_CIPHERED_PATH = "ciphered.png";

/** Exit codes for fatal pipeline failures. */
export const EXIT_MESSAGE_LOAD = 1;
export const EXIT_SECRET_LOAD = 2;
export const EXIT_CIPHERED_SAVE = 3;
