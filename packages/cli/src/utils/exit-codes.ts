/**
 * Exit Code Reference for the transjson CLI
 *
 * | Code | Meaning                                                      |
 * |------|--------------------------------------------------------------|
 * | 0    | Success                                                      |
 * | 1    | Error (bad input, configuration, provider could not load)    |
 * | 2    | Completed, but some strings kept their source text (--strict) |
 *
 * ```bash
 * npx transjson translate en.json -t es fr --strict
 * case $? in
 *   0) echo "All strings translated" ;;
 *   2) echo "Some strings fell back to source text" ;;
 *   *) echo "Translation failed" ;;
 * esac
 * ```
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  /** Some leaves kept their source text and --strict was set. */
  PARTIAL_FAILURE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const EXIT_CODE_DESCRIPTIONS: Record<number, string> = {
  [EXIT_CODES.SUCCESS]: 'Success',
  [EXIT_CODES.ERROR]: 'General error',
  [EXIT_CODES.PARTIAL_FAILURE]: 'Some strings could not be translated',
};

export function getExitCodeDescription(code: number): string {
  return EXIT_CODE_DESCRIPTIONS[code] ?? `Unknown exit code: ${code}`;
}

/**
 * Set the process exit code, logging it when `DEBUG` includes `transjson`.
 */
export function setExitCode(code: number): void {
  process.exitCode = code;
  if (code !== 0 && process.env.DEBUG?.includes('transjson')) {
    console.error(`[transjson] Exit code ${code}: ${getExitCodeDescription(code)}`);
  }
}
