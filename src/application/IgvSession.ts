import fs from 'node:fs';
import path from 'node:path';
import type { TransportPort } from '../domain/ports/TransportPort.js';
import type { ProcessLauncherPort } from '../domain/ports/ProcessLauncherPort.js';
import type { ConnectionState } from '../domain/entities/ConnectionState.js';
import { BatchCommand } from '../domain/value-objects/BatchCommand.js';
import type { CommandArgument } from '../domain/value-objects/CommandArgument.js';
import { expandPath, resolveGenome, resolveLocation } from '../domain/value-objects/DataLocation.js';
import { parseSortOption } from '../domain/value-objects/SortOption.js';
import { InvalidArgumentError, NotConnectedError } from '../domain/errors/DomainErrors.js';
import { SocketTransport } from '../infrastructure/socket/SocketTransport.js';
import { IgvProcessLauncher } from '../infrastructure/process/IgvProcessLauncher.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { Logger } from '../shared/Logger.js';

/** IGV 回應；null 表示對方在回應前關閉了連線 */
export type IgvResponse = string | null;

export interface IgvSessionOptions {
  host?: string;
  port?: number;
  connectTimeoutMs?: number;
  /**
   * open / start 時同步給 IGV 的 snapshot 目錄，預設為目前工作目錄。
   * 傳入 false 則不送 snapshotDirectory。
   */
  snapshotDir?: string | false;
}

export interface IgvStartOptions extends IgvSessionOptions {
  command?: string;
  extraArgs?: readonly string[];
  probePort?: boolean;
  readyTimeoutMs?: number;
  cwd?: string;
}

export interface IgvSessionDeps {
  transport?: TransportPort;
  launcher?: ProcessLauncherPort;
  /** 建立 snapshot 目錄（mkdir -p） */
  mkdir?: (dir: string) => void;
  /** genome 判斷本機檔案是否存在 */
  exists?: (p: string) => boolean;
}

export interface LoadOptions {
  /** 以 index=<value> 附加在路徑之後 */
  index?: string;
}

export interface SnapshotDirOptions {
  /** 即使與快取相同也重新送出 */
  force?: boolean;
}

export type SessionScope<T> = (igv: IgvSession) => Promise<T> | T;

/**
 * IGV batch port 的 session façade
 *
 * 每個方法：驗證 / 正規化參數 → 編碼成 BatchCommand → 經由 transport 送出 → 回傳原始回應。
 * 回應文字不做任何解讀（OK、錯誤訊息都原樣回傳）。
 *
 * snapshotDir 是 client 端對 IGV 狀態的快取，只能透過 setSnapshotDir 更新；
 * 使用者在 IGV 介面上修改時快取不會知道。
 */
export class IgvSession {
  readonly host: string;
  readonly port: number;

  private readonly connectTimeoutMs?: number;
  private readonly transport: TransportPort;
  private readonly launcher: ProcessLauncherPort;
  private readonly mkdir: (dir: string) => void;
  private readonly exists: (p: string) => boolean;
  private readonly commandHistory: string[] = [];
  private readonly logger = new Logger('IgvSession');
  private connectionState: ConnectionState = 'unconnected';
  private cachedSnapshotDir: string | undefined;
  private spawnedGroupId: number | undefined;
  private pendingConnect: Promise<void> | undefined;

  constructor(options: IgvSessionOptions = {}, deps: IgvSessionDeps = {}) {
    this.host = options.host ?? DEFAULT_CONFIG.connection.host;
    this.port = options.port ?? DEFAULT_CONFIG.connection.port;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.transport = deps.transport ?? new SocketTransport();
    this.launcher = deps.launcher ?? new IgvProcessLauncher();
    this.mkdir = deps.mkdir ?? ((dir) => {
      fs.mkdirSync(dir, { recursive: true });
    });
    this.exists = deps.exists ?? fs.existsSync;
  }

  /** 連上已在執行的 IGV，並同步 snapshot 目錄 */
  static async open(options: IgvSessionOptions = {}, deps: IgvSessionDeps = {}): Promise<IgvSession> {
    const session = new IgvSession(options, deps);
    await session.connect();
    try {
      await session.syncInitialSnapshotDir(options.snapshotDir);
    } catch (err) {
      session.close();
      throw err;
    }
    return session;
  }

  /** open 後執行 fn，不論成功或拋錯都關閉 socket */
  static async use<T>(
    options: IgvSessionOptions,
    fn: SessionScope<T>,
    deps: IgvSessionDeps = {},
  ): Promise<T> {
    const session = await IgvSession.open(options, deps);
    return session.use(fn);
  }

  /**
   * 啟動新的 IGV 並連線
   *
   * 回傳的 session 記錄 processGroupId，只有這種 session 可以 kill()。
   * 啟動後若連線失敗，會先結束剛啟動的 IGV 再拋出錯誤。
   */
  static async start(options: IgvStartOptions = {}, deps: IgvSessionDeps = {}): Promise<IgvSession> {
    const session = new IgvSession(options, deps);
    const record = await session.launcher.launch({
      command: options.command ?? DEFAULT_CONFIG.launch.command,
      port: session.port,
      host: session.host,
      extraArgs: options.extraArgs,
      probePort: options.probePort,
      readyTimeoutMs: options.readyTimeoutMs,
      cwd: options.cwd,
    });
    session.spawnedGroupId = record.processGroupId;
    session.logger.info('IGV started', { pid: record.pid, processGroupId: record.processGroupId });

    try {
      await session.connect();
      await session.syncInitialSnapshotDir(options.snapshotDir);
    } catch (err) {
      session.kill();
      throw err;
    }
    return session;
  }

  get state(): ConnectionState {
    if (this.connectionState === 'connected' && this.transport.isClosed()) {
      return 'closed';
    }
    return this.connectionState;
  }

  get snapshotDir(): string | undefined {
    return this.cachedSnapshotDir;
  }

  /** 依送出順序記錄的每一行指令（包含寫入失敗的） */
  get history(): readonly string[] {
    return [...this.commandHistory];
  }

  /** 只有由 start() 啟動 IGV 的 session 才有值 */
  get processGroupId(): number | undefined {
    return this.spawnedGroupId;
  }

  /** 連線進行中時重複呼叫會共用同一個 promise，不會再開第二條 socket */
  connect(): Promise<void> {
    if (!this.pendingConnect) {
      this.pendingConnect = this.openTransport().finally(() => {
        this.pendingConnect = undefined;
      });
    }
    return this.pendingConnect;
  }

  private async openTransport(): Promise<void> {
    await this.transport.connect(this.host, this.port, this.connectTimeoutMs);
    this.connectionState = 'connected';
    this.logger.debug('Session connected', { host: this.host, port: this.port });
  }

  close(): void {
    this.transport.close();
    if (this.connectionState !== 'unconnected') {
      this.connectionState = 'closed';
    }
  }

  isClosed(): boolean {
    return this.transport.isClosed();
  }

  /** 執行 fn，不論成功或拋錯都關閉 socket（IGV 本身不受影響） */
  async use<T>(fn: SessionScope<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      this.close();
    }
  }

  /** 送出任意指令；未包裝的 batch command 都走這裡 */
  async send(name: string, ...args: readonly CommandArgument[]): Promise<IgvResponse> {
    return this.dispatch(BatchCommand.of(name, ...args));
  }

  /** set<Name> 系列的通用入口，例如 set('SleepInterval', 200) → setSleepInterval 200 */
  async set(name: string, ...params: readonly CommandArgument[]): Promise<IgvResponse> {
    if (name.trim() === '') {
      throw new InvalidArgumentError('set() requires a sub-command name');
    }
    return this.send(`set${name.trim()}`, ...params);
  }

  // ── 導覽 ──

  /** 無參數時 IGV 回傳 "echo"，可用來確認連線 */
  echo(text?: string): Promise<IgvResponse> {
    return this.send('echo', text);
  }

  goto(...loci: readonly string[]): Promise<IgvResponse> {
    return this.send('goto', ...loci);
  }

  go(...loci: readonly string[]): Promise<IgvResponse> {
    return this.goto(...loci);
  }

  region(
    chr: string,
    start: number,
    end: number,
    description?: string,
  ): Promise<IgvResponse> {
    return this.send('region', chr, start, end, description);
  }

  scrollToTop(): Promise<IgvResponse> {
    return this.send('scrollToTop');
  }

  // ── 資料 ──

  /** 本機存在的檔案送絕對路徑，否則視為 genome id */
  genome(nameOrPath: string): Promise<IgvResponse> {
    return this.send('genome', resolveGenome(nameOrPath, this.exists));
  }

  load(pathOrUrl: string, options: LoadOptions = {}): Promise<IgvResponse> {
    const index = options.index === undefined ? undefined : `index=${options.index}`;
    return this.send('load', resolveLocation(pathOrUrl), index);
  }

  clear(): Promise<IgvResponse> {
    return this.send('clear');
  }

  /** 對應 batch command "new" */
  newSession(): Promise<IgvResponse> {
    return this.send('new');
  }

  saveSession(filePath: string): Promise<IgvResponse> {
    return this.send('saveSession', expandPath(filePath));
  }

  preferences(key: string, value: CommandArgument): Promise<IgvResponse> {
    return this.send('preferences', key, value);
  }

  setAccessToken(token: string, host?: string): Promise<IgvResponse> {
    return this.send('setAccessToken', token, host);
  }

  clearAccessTokens(): Promise<IgvResponse> {
    return this.send('clearAccessTokens');
  }

  // ── 排序與顯示 ──

  /** option 不在允許清單內時拋出 InvalidOptionError，不會送出任何東西 */
  async sort(option: string = 'base', locus?: string): Promise<IgvResponse> {
    const validated = parseSortOption(option);
    return this.send('sort', validated, locus);
  }

  expand(track?: string): Promise<IgvResponse> {
    return this.send('expand', track);
  }

  collapse(track?: string): Promise<IgvResponse> {
    return this.send('collapse', track);
  }

  squish(track?: string): Promise<IgvResponse> {
    return this.send('squish', track);
  }

  viewAsPairs(track?: string, enable?: boolean): Promise<IgvResponse> {
    return this.send('viewaspairs', track, enable);
  }

  colorBy(option: string, tag?: string): Promise<IgvResponse> {
    return this.send('colorBy', option, tag);
  }

  group(option: string, tag?: string): Promise<IgvResponse> {
    return this.send('group', option, tag);
  }

  overlay(...tracks: readonly string[]): Promise<IgvResponse> {
    return this.send('overlay', ...tracks);
  }

  separate(track: string): Promise<IgvResponse> {
    return this.send('separate', track);
  }

  maxPanelHeight(height: number): Promise<IgvResponse> {
    return this.send('maxPanelHeight', height);
  }

  setAltColor(color: string, track?: string): Promise<IgvResponse> {
    return this.send('setAltColor', color, track);
  }

  setColor(color: string, track?: string): Promise<IgvResponse> {
    return this.send('setColor', color, track);
  }

  setDataRange(range: string, track?: string): Promise<IgvResponse> {
    return this.send('setDataRange', range, track);
  }

  setLogScale(enabled: boolean, track?: string): Promise<IgvResponse> {
    return this.send('setLogScale', enabled, track);
  }

  /** "+" 或 "-" */
  setSequenceStrand(strand: string): Promise<IgvResponse> {
    return this.send('setSequenceStrand', strand);
  }

  setSequenceShowTranslation(show: boolean): Promise<IgvResponse> {
    return this.send('setSequenceShowTranslation', show);
  }

  setSleepInterval(ms: number): Promise<IgvResponse> {
    return this.send('setSleepInterval', ms);
  }

  setTrackHeight(height: number, track?: string): Promise<IgvResponse> {
    return this.send('setTrackHeight', height, track);
  }

  // ── Snapshot ──

  /**
   * 設定 IGV 的 snapshot 目錄
   *
   * 與快取相同且未 force 時直接回傳 undefined，不送任何指令。
   * 否則先在本機建立目錄、送出 snapshotDirectory，成功後才更新快取。
   */
  async setSnapshotDir(dir: string, options: SnapshotDirOptions = {}): Promise<IgvResponse | undefined> {
    const absolute = expandPath(dir);
    if (!options.force && absolute === this.cachedSnapshotDir) {
      return undefined;
    }

    this.assertConnected();
    this.mkdir(absolute);
    const response = await this.send('snapshotDirectory', absolute);
    this.cachedSnapshotDir = absolute;
    return response;
  }

  /**
   * 存 snapshot
   *
   * 只給檔名時存到 IGV 目前的 snapshot 目錄，只送一次 snapshot。
   * 帶目錄的路徑：暫時切換 snapshot 目錄 → snapshot 檔名 → 切回原本的目錄；
   * 目錄與快取相同時只送一次 snapshot。
   */
  async snapshot(filePath?: string): Promise<IgvResponse> {
    if (filePath === undefined) {
      return this.send('snapshot');
    }
    if (path.dirname(filePath.trim()) === '.') {
      return this.send('snapshot', path.basename(filePath.trim()));
    }

    const absolute = expandPath(filePath);
    const dir = path.dirname(absolute);
    const fileName = path.basename(absolute);
    const previous = this.cachedSnapshotDir;

    if (dir === previous) {
      return this.send('snapshot', fileName);
    }

    await this.setSnapshotDir(dir);
    let response: IgvResponse;
    try {
      response = await this.send('snapshot', fileName);
    } catch (err) {
      try {
        await this.restoreSnapshotDir(previous);
      } catch (restoreErr) {
        this.logger.warn('Failed to restore snapshot directory', {
          dir: previous,
          error: restoreErr instanceof Error ? restoreErr.message : String(restoreErr),
        });
      }
      throw err;
    }
    await this.restoreSnapshotDir(previous);
    return response;
  }

  private async restoreSnapshotDir(previous: string | undefined): Promise<void> {
    if (previous !== undefined && this.state === 'connected') {
      await this.setSnapshotDir(previous);
    }
  }

  save(filePath?: string): Promise<IgvResponse> {
    return this.snapshot(filePath);
  }

  // ── 結束 ──

  /** 要求 IGV 關閉，並關閉本地 socket */
  async exit(): Promise<IgvResponse> {
    try {
      return await this.send('exit');
    } finally {
      this.close();
    }
  }

  quit(): Promise<IgvResponse> {
    return this.exit();
  }

  /**
   * 結束由此 session 啟動的 IGV process group
   *
   * 連上既有 IGV 的 session 沒有 group id，只警告並回傳 false。
   */
  kill(): boolean {
    const groupId = this.spawnedGroupId;
    if (groupId === undefined) {
      this.logger.warn('IGV was not started by this session, so it cannot be killed');
      return false;
    }

    const signalled = this.launcher.terminate(groupId);
    this.spawnedGroupId = undefined;
    this.close();
    return signalled;
  }

  private async syncInitialSnapshotDir(dir: string | false | undefined): Promise<void> {
    if (dir === false) return;
    await this.setSnapshotDir(dir ?? process.cwd());
  }

  private assertConnected(): void {
    if (this.state !== 'connected') {
      throw new NotConnectedError();
    }
  }

  /** 先記錄 history（意圖），再寫出 */
  private async dispatch(command: BatchCommand): Promise<IgvResponse> {
    this.assertConnected();
    const line = command.toLine();
    this.commandHistory.push(line);
    this.logger.debug('Sending command', { command: line });
    return this.transport.request(line);
  }
}
