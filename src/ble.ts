/**
 * Wires the real BLE stacks behind the transport port.
 *
 * Both stacks hold process-wide resources (the HCI socket, the D-Bus
 * connection), so each transport is created once and shared by every lamp.
 */

import noble = require('@abandonware/noble');
import { createBluetooth } from 'node-ble';
import { HexagonLight, type LightController } from './device';
import { NobleTransport } from './transport-noble';
import { NodeBleTransport } from './transport-nodeble';
import type { BleBackend, LightOptions } from './types';

let nobleTransport: NobleTransport | null = null;
let nodeBle: { transport: NodeBleTransport; destroy: () => void } | null = null;

function getNobleTransport(): NobleTransport {
  if (!nobleTransport) {
    nobleTransport = new NobleTransport(noble);
  }
  return nobleTransport;
}

function getNodeBleTransport(): NodeBleTransport {
  if (!nodeBle) {
    const { bluetooth, destroy } = createBluetooth();
    const transport = new NodeBleTransport(async () => {
      const adapter = await bluetooth.defaultAdapter();
      if (!(await adapter.isPowered())) {
        throw new Error('Bluetooth adapter is powered off');
      }
      return adapter;
    });
    nodeBle = { transport, destroy };
  }
  return nodeBle.transport;
}

export function createLight(address: string, backend: BleBackend, options: Partial<LightOptions> = {}): LightController {
  switch (backend) {
    case 'noble':
      return new HexagonLight(address, getNobleTransport(), options);
    case 'node-ble':
      return new HexagonLight(address, getNodeBleTransport(), options);
  }
}

/** Close the D-Bus connection if node-ble was used. */
export function releaseTransports(): void {
  if (nodeBle) {
    nodeBle.destroy();
    nodeBle = null;
  }
}
