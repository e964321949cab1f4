// src/runner/view/network.ts
import { networkInterfaces } from 'node:os';

import type { AccessMode } from '../../cli/config/schema';

/** External IPv4 addresses of this machine. */
export const localAddresses = (): string[] => {
  const out: string[] = [];
  for (const list of Object.values(networkInterfaces())) {
    for (const info of list ?? []) {
      if (info.family === 'IPv4' && !info.internal) out.push(info.address);
    }
  }
  return out;
};

/** URLs a reader can open for a server on `port`. */
export const previewUrls = (
  access: AccessMode,
  port: number,
  addresses: readonly string[] = localAddresses(),
): string[] => {
  const local = `http://localhost:${String(port)}`;
  if (access === 'private') return [local];
  return [local, ...addresses.map((a) => `http://${a}:${String(port)}`)];
};
