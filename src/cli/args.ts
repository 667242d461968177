/** `--output <dir>`, `-o <dir>` or `--output=<dir>`; undefined when absent. */
export function parseOutputArg(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--output' || arg === '-o') {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        throw new Error(`${arg} requires a directory`);
      }
      return value;
    }
    if (arg.startsWith('--output=')) {
      return arg.slice('--output='.length);
    }
  }
  return undefined;
}
