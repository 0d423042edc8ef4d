import type { Server } from '@modelcontextprotocol/sdk/server/index.js';

export type ServerFactory = () => Server;

export interface RunningTransport {
  /** Human-readable endpoint summary for startup logs. */
  readonly description: string;
  close(): Promise<void>;
}
