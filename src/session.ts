import { buildCommand, Command, parseNotification } from './encoding';
import { ConnectionError, errorMessage, NotConnectedError, WriteError } from './errors';
import { NotificationSlot } from './notification-slot';
import { sleep } from './timing';
import type { Transport } from './transport';
import type { DeviceState, LightOptions } from './types';

export type SessionState = 'disconnected' | 'connecting' | 'connected';

/** Runs an operation somewhere else (the lamp's background queue) and reports back. */
export type Scheduler = <T>(operation: () => Promise<T>) => Promise<T>;

interface WriteConfig<C> {
  serviceUuid: string;
  charUuid: string;
  target: C;
  requiresResponse: boolean;
}

interface LiveConnection<H, C> {
  handle: H;
  write: WriteConfig<C>;
}

const runInline: Scheduler = operation => operation();

/**
 * One physical connection to a lamp: connect with retry and linear backoff,
 * write with a single reconnect-and-retry, and capture of the latest
 * notification for state queries.
 */
export class Session<H, C> {
  private phase: SessionState = 'disconnected';
  private live: LiveConnection<H, C> | null = null;
  private closing = false;
  readonly notifications = new NotificationSlot();

  constructor(
    private readonly address: string,
    private readonly transport: Transport<H, C>,
    private readonly options: LightOptions
  ) {}

  get state(): SessionState {
    if (this.phase === 'connected' && !this.isConnected()) {
      return 'disconnected';
    }
    return this.phase;
  }

  isConnected(): boolean {
    return this.live !== null && this.transport.isConnected(this.live.handle);
  }

  /** Allow connect attempts again after a disconnect. */
  open(): void {
    this.closing = false;
  }

  /** Abort pending connect retries; the link itself is closed by disconnect(). */
  markClosing(): void {
    this.closing = true;
  }

  async connect(): Promise<void> {
    const { connectRetries, retryDelayMs } = this.options;
    const maxAttempts = Math.max(1, connectRetries);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.closing) {
        throw new ConnectionError('Connect aborted (closing)');
      }
      if (this.isConnected()) {
        return;
      }

      this.phase = 'connecting';
      try {
        await this.attemptConnect();
        return;
      } catch (error) {
        lastError = error;
        this.phase = 'disconnected';
        console.warn(`[Session] Connect attempt ${attempt}/${maxAttempts} to ${this.address} failed: ${errorMessage(error)}`);
      }

      await sleep(retryDelayMs * attempt);
    }

    throw new ConnectionError(`Failed to connect after ${maxAttempts} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }

  async ensureConnected(): Promise<void> {
    if (this.isConnected()) {
      return;
    }
    await this.connect();
  }

  async write(frame: Buffer): Promise<void> {
    await this.ensureConnected();
    const first = this.requireLive();

    try {
      await this.transport.write(first.handle, first.write.target, frame, first.write.requiresResponse);
      return;
    } catch (error) {
      console.warn(`[Session] Write to ${this.address} failed, reconnecting once: ${errorMessage(error)}`);
      await this.drop(first.handle);
    }

    try {
      await this.ensureConnected();
      const retry = this.requireLive();
      await this.transport.write(retry.handle, retry.write.target, frame, retry.write.requiresResponse);
    } catch (error) {
      throw new WriteError(`Write to ${this.address} failed after reconnect: ${errorMessage(error)}`, { cause: error });
    }
  }

  async requestSync(): Promise<void> {
    await this.write(buildCommand(Command.SyncRequest));
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    const live = this.live;
    this.clearLive();
    if (live) {
      await this.closeQuietly(live.handle);
      console.log(`[Session] Disconnected from ${this.address}`);
    }
  }

  /**
   * Best-effort state read. Connection and sync request go through
   * `schedule`; the wait for a notification happens here, on the caller's
   * side. Connectivity problems degrade to an unknown state.
   */
  async awaitState(waitMs: number, requestSync: boolean, schedule: Scheduler = runInline): Promise<DeviceState> {
    this.notifications.reset();
    try {
      await schedule(async () => {
        await this.ensureConnected();
        if (requestSync) {
          await this.requestSync();
        }
      });
    } catch (error) {
      console.warn(`[Session] State query for ${this.address} returned unknown: ${errorMessage(error)}`);
      return {};
    }

    const woken = await this.notifications.wait(waitMs);
    const latest = this.notifications.latest;
    if (latest === null) {
      return {};
    }
    return woken ? parseNotification(latest) : { raw: latest };
  }

  private async attemptConnect(): Promise<void> {
    const { serviceUuid, writeUuid, notifyUuid, timeoutMs } = this.options;
    let handle: H | null = null;

    try {
      handle = await this.transport.connect(this.address, timeoutMs, () => {
        if (handle !== null) this.handleLinkLost(handle);
      });
      const { target, requiresResponse } = await this.transport.resolveWriteTarget(handle, serviceUuid, writeUuid);

      try {
        await this.transport.subscribe(handle, notifyUuid, data => this.notifications.publish(data));
      } catch (error) {
        console.warn(`[Session] Notifications unavailable on ${notifyUuid} (non-fatal): ${errorMessage(error)}`);
      }

      this.live = {
        handle,
        write: { serviceUuid, charUuid: writeUuid, target, requiresResponse },
      };
      this.phase = 'connected';
      this.notifications.reset();
      console.log(`[Session] Connected to ${this.address} (write response: ${requiresResponse})`);
    } catch (error) {
      if (handle !== null) {
        await this.closeQuietly(handle);
      }
      throw error;
    }
  }

  private requireLive(): LiveConnection<H, C> {
    if (!this.live) {
      throw new NotConnectedError('Not connected');
    }
    return this.live;
  }

  private handleLinkLost(handle: H): void {
    if (this.live?.handle !== handle) {
      return;
    }
    console.log(`[Session] Link to ${this.address} lost`);
    this.clearLive();
  }

  private async drop(handle: H): Promise<void> {
    if (this.live?.handle === handle) {
      this.clearLive();
    }
    await this.closeQuietly(handle);
  }

  private clearLive(): void {
    this.live = null;
    this.phase = 'disconnected';
    this.notifications.clear();
  }

  private async closeQuietly(handle: H): Promise<void> {
    try {
      await this.transport.disconnect(handle);
    } catch (error) {
      console.warn(`[Session] Error disconnecting ${this.address}: ${errorMessage(error)}`);
    }
  }
}
