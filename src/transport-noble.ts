/**
 * Transport backed by @abandonware/noble (HCI socket).
 *
 * noble only hands out peripherals it has seen advertising, so connecting
 * means scanning until the target address shows up. The shapes below are
 * the parts of noble's Peripheral/Characteristic API this transport uses.
 */

import { ConnectionError, NotFoundError } from './errors';
import { withTimeout } from './timing';
import { normalizeAddress, normalizeUuid, type Transport, type WriteTarget } from './transport';

export interface NobleCharacteristic {
  uuid: string;
  properties: string[];
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
  subscribeAsync(): Promise<void>;
  on(event: 'data', listener: (data: Buffer, isNotification: boolean) => void): unknown;
}

export interface NoblePeripheral {
  id: string;
  address: string;
  state: string;
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  once(event: 'disconnect', listener: () => void): unknown;
  discoverSomeServicesAndCharacteristicsAsync(
    serviceUUIDs: string[],
    characteristicUUIDs: string[]
  ): Promise<{ characteristics: NobleCharacteristic[] }>;
}

export interface NobleCentral {
  _state: string;
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  on(event: 'discover', listener: (peripheral: NoblePeripheral) => void): unknown;
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

interface ConnectAttempt {
  abandoned: boolean;
  poweredOnWaiter?: () => void;
}

export interface NobleLink {
  address: string;
  peripheral: NoblePeripheral;
  characteristics: Map<string, NobleCharacteristic>;
}

export class NobleTransport implements Transport<NobleLink, NobleCharacteristic> {
  private readonly seen = new Map<string, NoblePeripheral>();
  private readonly lookingFor = new Map<string, (peripheral: NoblePeripheral) => void>();
  private readonly poweredOnWaiters = new Set<() => void>();
  private isScanning = false;

  constructor(private readonly central: NobleCentral) {
    this.central.on('stateChange', state => {
      console.log(`[Noble] Adapter state: ${state}`);
      if (state === 'poweredOn') {
        for (const resolve of this.poweredOnWaiters) resolve();
        this.poweredOnWaiters.clear();
      }
    });
    this.central.on('discover', peripheral => this.handleDiscover(peripheral));
  }

  async connect(address: string, timeoutMs: number, onDisconnect?: () => void): Promise<NobleLink> {
    const attempt: ConnectAttempt = { abandoned: false };
    const opening = this.open(address, attempt, onDisconnect);

    try {
      return await withTimeout(
        opening,
        timeoutMs,
        () => new ConnectionError(`Connection to ${address} timed out after ${timeoutMs}ms`)
      );
    } catch (error) {
      attempt.abandoned = true;
      if (attempt.poweredOnWaiter) {
        this.poweredOnWaiters.delete(attempt.poweredOnWaiter);
      }
      this.lookingFor.delete(normalizeAddress(address));
      await this.stopScan();
      throw error;
    }
  }

  async resolveWriteTarget(
    link: NobleLink,
    serviceUuid: string,
    charUuid: string
  ): Promise<WriteTarget<NobleCharacteristic>> {
    const { characteristics } = await link.peripheral.discoverSomeServicesAndCharacteristicsAsync(
      [normalizeUuid(serviceUuid)],
      []
    );
    if (characteristics.length === 0) {
      throw new NotFoundError(`Service not found: ${serviceUuid}`);
    }
    for (const characteristic of characteristics) {
      link.characteristics.set(normalizeUuid(characteristic.uuid), characteristic);
    }

    const target = link.characteristics.get(normalizeUuid(charUuid));
    if (!target) {
      console.warn(`[Noble] Available characteristics:`, [...link.characteristics.keys()]);
      throw new NotFoundError(`Write characteristic not found: ${charUuid}`);
    }

    return { target, requiresResponse: !target.properties.includes('writeWithoutResponse') };
  }

  async subscribe(link: NobleLink, charUuid: string, onNotify: (data: Buffer) => void): Promise<void> {
    const uuid = normalizeUuid(charUuid);
    let characteristic = link.characteristics.get(uuid);
    if (!characteristic) {
      const { characteristics } = await link.peripheral.discoverSomeServicesAndCharacteristicsAsync([], [uuid]);
      characteristic = characteristics.find(c => normalizeUuid(c.uuid) === uuid);
    }
    if (!characteristic) {
      throw new NotFoundError(`Notify characteristic not found: ${charUuid}`);
    }

    characteristic.on('data', data => onNotify(data));
    await characteristic.subscribeAsync();
  }

  async write(_link: NobleLink, target: NobleCharacteristic, data: Buffer, withResponse: boolean): Promise<void> {
    await target.writeAsync(data, !withResponse);
  }

  async disconnect(link: NobleLink): Promise<void> {
    if (link.peripheral.state === 'disconnected') {
      return;
    }
    await link.peripheral.disconnectAsync();
  }

  isConnected(link: NobleLink): boolean {
    return link.peripheral.state === 'connected';
  }

  private async open(
    address: string,
    attempt: ConnectAttempt,
    onDisconnect?: () => void
  ): Promise<NobleLink> {
    await this.waitForPoweredOn(attempt);
    const peripheral = await this.findPeripheral(address);

    if (peripheral.state !== 'connected') {
      console.log(`[Noble] Connecting to ${address} (current state: ${peripheral.state})...`);
      await peripheral.connectAsync();
    }

    // The caller gave up while we were connecting; don't leave the link open
    if (attempt.abandoned) {
      await peripheral.disconnectAsync();
      throw new ConnectionError(`Connection to ${address} abandoned`);
    }

    peripheral.once('disconnect', () => {
      console.log(`[Noble] ${address} disconnected`);
      onDisconnect?.();
    });
    console.log(`[Noble] Connection established to ${address}`);
    return { address, peripheral, characteristics: new Map() };
  }

  private waitForPoweredOn(attempt: ConnectAttempt): Promise<void> {
    if (this.central._state === 'poweredOn') {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      attempt.poweredOnWaiter = resolve;
      this.poweredOnWaiters.add(resolve);
    });
  }

  private async findPeripheral(address: string): Promise<NoblePeripheral> {
    const key = normalizeAddress(address);
    const known = this.seen.get(key);
    if (known) {
      return known;
    }

    const found = new Promise<NoblePeripheral>(resolve => this.lookingFor.set(key, resolve));
    console.log(`[Noble] Scanning for ${address}...`);
    this.isScanning = true;
    await this.central.startScanningAsync([], true);

    const peripheral = await found;
    await this.stopScan();
    return peripheral;
  }

  private handleDiscover(peripheral: NoblePeripheral): void {
    // address is the MAC on Linux; on macOS only the id identifies the device
    const keys = [peripheral.address, peripheral.id].filter(Boolean).map(normalizeAddress);
    for (const key of keys) {
      this.seen.set(key, peripheral);
      const resolve = this.lookingFor.get(key);
      if (resolve) {
        this.lookingFor.delete(key);
        resolve(peripheral);
      }
    }
  }

  private async stopScan(): Promise<void> {
    if (!this.isScanning) {
      return;
    }
    this.isScanning = false;
    await this.central.stopScanningAsync();
  }
}
