import { type FetchLike, MembershipClient } from '../client';
import type { ApiConnection } from '../config';

export type Print = (line: string) => void;

export interface CommandContext {
  print: Print;
  /** Transport used by the membership client; defaults to the global fetch. */
  fetchImpl?: FetchLike;
}

export interface CommandResult {
  exitCode: number;
}

export function printLines(print: Print, lines: readonly string[]): void {
  for (const line of lines) {
    print(line);
  }
}

export function createClient(connection: ApiConnection, ctx: CommandContext): MembershipClient {
  return new MembershipClient(connection, ctx.fetchImpl);
}
