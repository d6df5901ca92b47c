import { execFile } from 'child_process';
import os from 'os';
import { IServiceStateProvider, RawServiceState } from './types';

const LOCAL_HOSTS: ReadonlySet<string> = new Set(['localhost', '127.0.0.1', '::1']);

/**
 * Map the single-line answer of `systemctl is-active` to a raw state.
 * Transitional answers (activating, reloading, ...) are ambiguous.
 */
export function parseIsActiveOutput(output: string): RawServiceState {
  switch (output.trim()) {
    case 'active':
      return 'running';
    case 'inactive':
    case 'failed':
      return 'stopped';
    default:
      return 'unknown';
  }
}

export interface SystemctlStateProviderOptions {
  command?: string;
  /** Name of the machine this process runs on */
  localHostName?: string;
}

/**
 * Reads service state through `systemctl is-active`. Hosts other than the
 * local machine are reached with systemctl's own `--host` (ssh) transport.
 */
export class SystemctlStateProvider implements IServiceStateProvider {
  private readonly command: string;
  private readonly localHostName: string;

  constructor(options: SystemctlStateProviderOptions = {}) {
    this.command = options.command ?? 'systemctl';
    this.localHostName = options.localHostName ?? os.hostname();
  }

  buildArgs(serviceName: string, host: string): string[] {
    const args = ['is-active', serviceName];
    if (!this.isLocal(host)) {
      args.unshift(`--host=${host}`);
    }
    return args;
  }

  getState(serviceName: string, host: string, signal: AbortSignal): Promise<RawServiceState> {
    const args = this.buildArgs(serviceName, host);

    return new Promise((resolve, reject) => {
      execFile(this.command, args, { signal, encoding: 'utf8' }, (error, stdout) => {
        // is-active exits non-zero for inactive units but still answers on stdout
        if (stdout.trim() !== '') {
          resolve(parseIsActiveOutput(stdout));
          return;
        }
        if (error) {
          reject(error);
          return;
        }
        resolve('unknown');
      });
    });
  }

  private isLocal(host: string): boolean {
    return LOCAL_HOSTS.has(host) || host === this.localHostName;
  }
}
