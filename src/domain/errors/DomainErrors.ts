/**
 * - caller：呼叫端給了不合法的值，在任何 I/O 之前就拋出
 * - connection：socket 連線、寫入失敗，或根本沒有連線
 * - process：啟動 IGV 子行程相關
 */
export type ErrorClassification = 'caller' | 'connection' | 'process';

/** 所有 igvctl 錯誤的基底類別 */
export abstract class IgvClientError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Caller ---

export class InvalidArgumentError extends IgvClientError {
  readonly classification = 'caller' as const;
  readonly code = 'INVALID_ARGUMENT';
}

export class InvalidOptionError extends IgvClientError {
  readonly classification = 'caller' as const;
  readonly code = 'INVALID_OPTION';

  constructor(
    public readonly option: string,
    public readonly validOptions: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      `Invalid option "${option}". Valid options: ${validOptions.join(', ')}.`,
      options,
    );
  }
}

// --- Connection ---

export class ConnectionError extends IgvClientError {
  readonly classification = 'connection' as const;
  readonly code = 'CONNECTION';
}

export class NotConnectedError extends IgvClientError {
  readonly classification = 'connection' as const;
  readonly code = 'NOT_CONNECTED';

  constructor(options?: ErrorOptions) {
    super('Not connected to IGV. Call connect() first.', options);
  }
}

// --- Process ---

export class PortInUseError extends IgvClientError {
  readonly classification = 'process' as const;
  readonly code = 'PORT_IN_USE';

  constructor(
    public readonly port: number,
    options?: ErrorOptions,
  ) {
    super(`Port ${port} is already in use. Attach with "open" or choose another port.`, options);
  }
}

export class ProcessLaunchError extends IgvClientError {
  readonly classification = 'process' as const;
  readonly code = 'PROCESS_LAUNCH';
}
