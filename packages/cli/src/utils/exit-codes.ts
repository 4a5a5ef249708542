/**
 * Exit codes of the linguamerge CLI.
 *
 * | Code | Meaning                                               |
 * |------|-------------------------------------------------------|
 * | 0    | Success                                               |
 * | 1    | Error (bad input, missing catalog, git failure, ...)  |
 * | 2    | Some update requests named a context that is missing |
 *
 * ```bash
 * npx linguamerge apply --input updates.json --catalog translations/app_zh_CN.ts
 * if [ $? -eq 2 ]; then
 *   echo "Check the context names of the failed updates"
 * fi
 * ```
 */

export const GENERAL_EXIT_CODES = {
  SUCCESS: 0,
  /** Catch-all for exceptions */
  ERROR: 1,
} as const;

/**
 * Exit codes for `apply` and `import`.
 */
export const UPDATE_EXIT_CODES = {
  /** At least one request failed to match a context */
  FAILED_MATCHES: 2,
} as const;

export type UpdateExitCode = (typeof UPDATE_EXIT_CODES)[keyof typeof UPDATE_EXIT_CODES];
