/**
 * Output channels. stdout carries only command results; everything meant
 * for a human goes to stderr.
 */

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const processOutput: CliOutput = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Run `action` with console.log and console.info writing to stderr, so
 * engine diagnostics never reach the result a plugin reads from stdout.
 * The original methods are restored afterwards, also when `action` throws.
 */
export async function withDiagnosticsOnStderr<T>(action: () => Promise<T>): Promise<T> {
  const { log, info } = console;
  console.log = console.error;
  console.info = console.error;
  try {
    return await action();
  } finally {
    console.log = log;
    console.info = info;
  }
}
