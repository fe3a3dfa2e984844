import type { IgvctlConfig } from './types.js';

export const CONFIG_FILE_NAME = '.igvctl.json';

export const DEFAULT_CONFIG: IgvctlConfig = {
  version: 1,
  connection: {
    host: '127.0.0.1',
    port: 60151,
    connectTimeoutMs: 10000,
  },
  launch: {
    command: 'igv',
    extraArgs: [],
    probePort: true,
  },
  snapshot: {},
  log: {
    level: 'info',
  },
};
