import { InviteSyncError, TransportError } from './errors';
import { renderTransportFailure } from './report';

export interface CliIO {
  print: (line: string) => void;
  printError: (error: unknown) => void;
  setExitCode: (code: number) => void;
}

const defaultIO: CliIO = {
  print: (line) => console.log(line),
  printError: (error) => console.error(error),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/** Prints a failure for the operator and returns the exit code it maps to. */
export function reportFailure(error: unknown, io: Pick<CliIO, 'print' | 'printError'>): number {
  if (error instanceof TransportError) {
    io.print(`ERROR: ${error.message}`);
    for (const line of renderTransportFailure(error).slice(1)) {
      io.print(line);
    }
    return error.exitCode;
  }
  if (error instanceof InviteSyncError) {
    io.print(`ERROR: ${error.message}`);
    return error.exitCode;
  }
  io.printError(error);
  return 1;
}

/**
 * Runs a script's main function and turns its result or failure into the process exit code.
 * Never rejects.
 */
export async function runCli(main: () => Promise<number>, io: CliIO = defaultIO): Promise<void> {
  try {
    io.setExitCode(await main());
  } catch (error) {
    io.setExitCode(reportFailure(error, io));
  }
}
