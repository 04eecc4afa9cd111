/**
 * Transport port: the GATT operations a session needs from a BLE stack.
 *
 * `H` is the stack's connection handle and `C` its reference to a resolved
 * characteristic. Both are opaque to the session.
 */

export interface WriteTarget<C> {
  target: C;
  requiresResponse: boolean; // false only when the characteristic allows write-without-response
}

export interface Transport<H, C> {
  /** Open a connection. `onDisconnect` fires if the link drops later. */
  connect(address: string, timeoutMs: number, onDisconnect?: () => void): Promise<H>;
  /** Rejects with NotFoundError when the service or characteristic is missing. */
  resolveWriteTarget(handle: H, serviceUuid: string, charUuid: string): Promise<WriteTarget<C>>;
  subscribe(handle: H, charUuid: string, onNotify: (data: Buffer) => void): Promise<void>;
  write(handle: H, target: C, data: Buffer, withResponse: boolean): Promise<void>;
  /** Idempotent and best-effort. */
  disconnect(handle: H): Promise<void>;
  isConnected(handle: H): boolean;
}

const BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

/**
 * Lowercase, no dashes, and Bluetooth SIG base UUIDs shortened to their
 * 16-bit form (the way noble reports them): "0000FFF3-0000-1000-8000-00805F9B34FB" -> "fff3".
 */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.toLowerCase().replace(/-/g, '');
  const match = /^0000([0-9a-f]{4})(.*)$/.exec(compact);
  if (match && match[2] === BASE_UUID_SUFFIX) {
    return match[1];
  }
  return compact;
}

/** Full dashed 128-bit form, as BlueZ expects it. */
export function expandUuid(uuid: string): string {
  const short = normalizeUuid(uuid);
  const full = short.length === 4 ? `0000${short}${BASE_UUID_SUFFIX}` : short;
  if (full.length !== 32) {
    return full;
  }
  return [full.slice(0, 8), full.slice(8, 12), full.slice(12, 16), full.slice(16, 20), full.slice(20)].join('-');
}

export function normalizeAddress(mac: string): string {
  return mac.toLowerCase().replace(/[:-]/g, '');
}
