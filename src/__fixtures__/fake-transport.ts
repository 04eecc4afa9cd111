import { NotFoundError } from '../errors';
import type { Transport, WriteTarget } from '../transport';

export interface FakeHandle {
  id: number;
  address: string;
  connected: boolean;
  onDisconnect?: () => void;
  onNotify?: (data: Buffer) => void;
}

export interface FakeCharacteristic {
  uuid: string;
}

export interface RecordedWrite {
  handle: number;
  data: Buffer;
  withResponse: boolean;
}

/** In-memory lamp link. Failure counters are consumed one call at a time. */
export class FakeTransport implements Transport<FakeHandle, FakeCharacteristic> {
  connectFailures = 0;
  writeFailures = 0;
  subscribeFails = false;
  missingWriteChar = false;
  writeWithoutResponse = true;
  respondToSync: Buffer | null = null;

  connectCalls = 0;
  disconnectCalls = 0;
  readonly writes: RecordedWrite[] = [];
  current: FakeHandle | null = null;
  private nextId = 1;

  async connect(address: string, _timeoutMs: number, onDisconnect?: () => void): Promise<FakeHandle> {
    this.connectCalls++;
    if (this.connectFailures > 0) {
      this.connectFailures--;
      throw new Error('connect failed');
    }
    const handle: FakeHandle = { id: this.nextId++, address, connected: true, onDisconnect };
    this.current = handle;
    return handle;
  }

  async resolveWriteTarget(
    _handle: FakeHandle,
    _serviceUuid: string,
    charUuid: string
  ): Promise<WriteTarget<FakeCharacteristic>> {
    if (this.missingWriteChar) {
      throw new NotFoundError(`Write characteristic not found: ${charUuid}`);
    }
    return { target: { uuid: charUuid }, requiresResponse: !this.writeWithoutResponse };
  }

  async subscribe(handle: FakeHandle, _charUuid: string, onNotify: (data: Buffer) => void): Promise<void> {
    if (this.subscribeFails) {
      throw new Error('subscribe failed');
    }
    handle.onNotify = onNotify;
  }

  async write(handle: FakeHandle, _target: FakeCharacteristic, data: Buffer, withResponse: boolean): Promise<void> {
    if (!handle.connected) {
      throw new Error('link down');
    }
    if (this.writeFailures > 0) {
      this.writeFailures--;
      throw new Error('write failed');
    }
    this.writes.push({ handle: handle.id, data: Buffer.from(data), withResponse });

    // 0x00 is the sync request
    if (this.respondToSync && data[1] === 0x00) {
      handle.onNotify?.(this.respondToSync);
    }
  }

  async disconnect(handle: FakeHandle): Promise<void> {
    if (!handle.connected) {
      return;
    }
    this.disconnectCalls++;
    handle.connected = false;
  }

  isConnected(handle: FakeHandle): boolean {
    return handle.connected;
  }

  emitNotification(data: Buffer): void {
    this.current?.onNotify?.(data);
  }

  /** Simulate the lamp going out of range. */
  dropLink(): void {
    const handle = this.current;
    if (handle?.connected) {
      handle.connected = false;
      handle.onDisconnect?.();
    }
  }

  writtenHex(): string[] {
    return this.writes.map(write => write.data.toString('hex'));
  }
}
