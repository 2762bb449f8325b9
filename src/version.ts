/** Package version, reported by `getInfo()` and `--version`. */
export const VERSION = '1.0.0';
