/**
 * Hardware Detection
 *
 * Runs every probe against a SystemReader and assembles a validated
 * HardwareFacts snapshot plus the context the CLI reports alongside it.
 */

import { createHardwareFacts } from '../core/facts.js';
import type { HardwareFacts } from '../core/types.js';
import { detectContainer, type ContainerType } from './container.js';
import { detectCpu } from './cpu.js';
import { detectDisk } from './disk.js';
import { detectMemory, type MemorySource } from './memory.js';
import { detectNetwork } from './network.js';
import { detectPlatform, type PlatformFamily } from './platform.js';
import type { SystemReader } from './reader.js';

export { FsSystemReader, type SystemReader } from './reader.js';

/**
 * Everything detection learned about the host
 */
export interface DetectedSystem {
  facts: HardwareFacts;
  containerType: ContainerType | null;
  platform: PlatformFamily;
  /** Default install path for the platform */
  installPath: string;
  interfaceName: string | null;
  diskDevice: string | null;
  memorySource: MemorySource;
  /** Caveats worth showing the operator */
  notes: string[];
}

export async function detectSystem(reader: SystemReader): Promise<DetectedSystem> {
  const container = await detectContainer(reader);
  const platform = await detectPlatform(reader);
  const cpu = await detectCpu(reader);
  const memory = await detectMemory(reader, container.isContainer);
  const network = await detectNetwork(reader);
  const disk = await detectDisk(reader, container.isContainer);

  const notes: string[] = [];
  if (memory.source === 'cgroup') {
    notes.push(`RAM reflects the container memory limit (${memory.ramGB}GB).`);
  }
  if (memory.source === 'fallback') {
    notes.push('MemTotal could not be read; assuming 1GB RAM.');
  }
  if (!network.measured) {
    notes.push(
      network.interfaceName !== null
        ? `Link speed of ${network.interfaceName} unavailable; assuming ${network.nicMbps}Mb/s.`
        : `No network interface found; assuming ${network.nicMbps}Mb/s.`
    );
  }
  if (disk.ioLimited) {
    notes.push('Container I/O may be limited by cgroup settings.');
  }

  const facts = createHardwareFacts({
    cores: cpu.cores,
    threads: cpu.threads,
    ramGB: memory.ramGB,
    nicMbps: network.nicMbps,
    diskMedium: disk.diskMedium,
    isContainer: container.isContainer,
  });

  return {
    facts,
    containerType: container.type,
    platform: platform.family,
    installPath: platform.installPath,
    interfaceName: network.interfaceName,
    diskDevice: disk.device,
    memorySource: memory.source,
    notes,
  };
}
