/**
 * Transport backed by node-ble (BlueZ over D-Bus).
 *
 * BlueZ keeps its own device cache and handles concurrent links better
 * than raw HCI on a Raspberry Pi. The shapes below are the parts of
 * node-ble's Adapter/Device/GATT API this transport uses.
 */

import { ConnectionError, errorMessage, NotFoundError } from './errors';
import { withTimeout } from './timing';
import { expandUuid, type Transport, type WriteTarget } from './transport';

export interface NodeBleCharacteristic {
  getFlags(): Promise<string[]>;
  writeValueWithResponse(buffer: Buffer): Promise<void>;
  writeValueWithoutResponse(buffer: Buffer): Promise<void>;
  startNotifications(): Promise<void>;
  on(event: 'valuechanged', listener: (buffer: Buffer) => void): unknown;
}

export interface NodeBleService {
  getCharacteristic(uuid: string): Promise<NodeBleCharacteristic>;
}

export interface NodeBleGattServer {
  getPrimaryService(uuid: string): Promise<NodeBleService>;
}

export interface NodeBleDevice {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  gatt(): Promise<NodeBleGattServer>;
  on(event: 'disconnect', listener: () => void): unknown;
}

export interface NodeBleAdapter {
  isDiscovering(): Promise<boolean>;
  startDiscovery(): Promise<void>;
  waitDevice(address: string, timeout?: number): Promise<NodeBleDevice>;
}

export interface NodeBleLink {
  address: string;
  device: NodeBleDevice;
  gatt: NodeBleGattServer;
  service: NodeBleService | null;
  connected: boolean;
}

export class NodeBleTransport implements Transport<NodeBleLink, NodeBleCharacteristic> {
  private adapter: Promise<NodeBleAdapter> | null = null;

  constructor(private readonly getAdapter: () => Promise<NodeBleAdapter>) {}

  async connect(address: string, timeoutMs: number, onDisconnect?: () => void): Promise<NodeBleLink> {
    const adapter = await this.defaultAdapter();
    if (!(await adapter.isDiscovering())) {
      await adapter.startDiscovery();
    }

    // BlueZ object paths use the uppercase colon-separated MAC
    const mac = address.toUpperCase();
    console.log(`[NodeBle] Waiting for ${mac}...`);
    const device = await adapter.waitDevice(mac, timeoutMs);

    let settled = false;
    const connecting = device.connect().finally(() => {
      settled = true;
    });

    let gatt: NodeBleGattServer;
    try {
      await withTimeout(
        connecting,
        timeoutMs,
        () => new ConnectionError(`Connection to ${mac} timed out after ${timeoutMs}ms`)
      );
      console.log(`[NodeBle] Connected to ${mac}`);
      gatt = await device.gatt();
    } catch (error) {
      await this.dropDevice(device, mac);
      if (!settled) {
        // BlueZ may still finish the connect after we gave up
        void connecting.then(
          () => this.dropDevice(device, mac),
          (lateError: unknown) => console.log(`[NodeBle] Abandoned connect to ${mac} failed: ${errorMessage(lateError)}`)
        );
      }
      throw error;
    }

    const link: NodeBleLink = { address: mac, device, gatt, service: null, connected: true };
    device.on('disconnect', () => {
      if (!link.connected) {
        return;
      }
      link.connected = false;
      console.log(`[NodeBle] ${mac} disconnected`);
      onDisconnect?.();
    });
    return link;
  }

  async resolveWriteTarget(
    link: NodeBleLink,
    serviceUuid: string,
    charUuid: string
  ): Promise<WriteTarget<NodeBleCharacteristic>> {
    try {
      link.service = await link.gatt.getPrimaryService(expandUuid(serviceUuid));
    } catch (error) {
      throw new NotFoundError(`Service not found: ${serviceUuid} (${errorMessage(error)})`);
    }

    const target = await this.characteristic(link.service, charUuid, 'Write');
    const flags = await target.getFlags();
    return { target, requiresResponse: !flags.includes('write-without-response') };
  }

  async subscribe(link: NodeBleLink, charUuid: string, onNotify: (data: Buffer) => void): Promise<void> {
    if (!link.service) {
      throw new NotFoundError('Control service not resolved before subscribing');
    }
    const characteristic = await this.characteristic(link.service, charUuid, 'Notify');
    characteristic.on('valuechanged', buffer => onNotify(buffer));
    await characteristic.startNotifications();
  }

  async write(_link: NodeBleLink, target: NodeBleCharacteristic, data: Buffer, withResponse: boolean): Promise<void> {
    if (withResponse) {
      await target.writeValueWithResponse(data);
    } else {
      await target.writeValueWithoutResponse(data);
    }
  }

  async disconnect(link: NodeBleLink): Promise<void> {
    if (!link.connected) {
      return;
    }
    link.connected = false;
    link.service = null;
    await link.device.disconnect();
  }

  isConnected(link: NodeBleLink): boolean {
    return link.connected;
  }

  private defaultAdapter(): Promise<NodeBleAdapter> {
    if (!this.adapter) {
      this.adapter = this.getAdapter().catch((error: unknown) => {
        this.adapter = null;
        throw error;
      });
    }
    return this.adapter;
  }

  private async dropDevice(device: NodeBleDevice, mac: string): Promise<void> {
    try {
      await device.disconnect();
    } catch (error) {
      console.warn(`[NodeBle] Failed to disconnect ${mac}: ${errorMessage(error)}`);
    }
  }

  private async characteristic(service: NodeBleService, uuid: string, role: string): Promise<NodeBleCharacteristic> {
    try {
      return await service.getCharacteristic(expandUuid(uuid));
    } catch (error) {
      throw new NotFoundError(`${role} characteristic not found: ${uuid} (${errorMessage(error)})`);
    }
  }
}
