import { readFileSync } from 'node:fs';
import { arch as hostArch } from 'node:os';
import type { RuntimeConfig } from './config.js';

export const PROGRAM_NAME = 'hatch';
export const VERSION = '0.1.0';

const NODE_TO_HATCH_ARCH: Record<string, string> = {
  x64: 'x86_64',
  ia32: 'i386',
  arm64: 'aarch64',
  arm: 'arm',
  ppc64: 'ppc64le',
  s390x: 's390x',
  riscv64: 'riscv64',
  loong64: 'loongarch64',
};

// Architectures each native one can also run.
const COMPAT_ARCHES: Record<string, readonly string[]> = {
  x86_64: ['i386'],
  aarch64: ['arm'],
};

const NVIDIA_VERSION_PATH = '/sys/module/nvidia/version';

export interface SystemInfo {
  defaultArch(): string;
  supportedArches(): string[];
  glDrivers(): string[];
}

export function normalizeArch(nodeArch: string) {
  return Object.hasOwn(NODE_TO_HATCH_ARCH, nodeArch) ? NODE_TO_HATCH_ARCH[nodeArch] ?? nodeArch : nodeArch;
}

export class HostSystemInfo implements SystemInfo {
  constructor(
    private readonly config: Pick<RuntimeConfig, 'arch' | 'glDrivers'>,
    private readonly readText: (path: string) => string | undefined = readOptionalFile,
    private readonly nodeArch: string = hostArch(),
  ) {}

  defaultArch() {
    return this.config.arch ?? normalizeArch(this.nodeArch);
  }

  supportedArches() {
    const primary = this.defaultArch();
    const compat = Object.hasOwn(COMPAT_ARCHES, primary) ? COMPAT_ARCHES[primary] ?? [] : [];
    return [primary, ...compat];
  }

  glDrivers() {
    if (this.config.glDrivers && this.config.glDrivers.length > 0) {
      return [...this.config.glDrivers];
    }

    const drivers: string[] = [];
    const nvidiaVersion = this.readText(NVIDIA_VERSION_PATH)?.trim();
    if (nvidiaVersion) {
      drivers.push(`nvidia-${nvidiaVersion.replaceAll('.', '-')}`);
    }
    drivers.push('default', 'host');
    return drivers;
  }
}

function readOptionalFile(path: string) {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    return undefined;
  }
}
