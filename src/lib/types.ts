// shared types between the checker, selector and front ends

export interface HostDescriptor {
  name: string;
  host: string;   // address handed to ssh
  hasGpu: boolean;
}

export interface CommandSet {
  cpu: string;
  memory: string;
  load: string;
  gpuUsage: string;
  gpuMemory: string;
  gpuProcesses?: string;
}

export type RemoteErrorKind =
  | 'UnknownHost'
  | 'ConnectionRefused'
  | 'PermissionDenied'
  | 'Timeout'
  | 'RemoteCommandError';

export interface RemoteError {
  kind: RemoteErrorKind;
  host: string;
  message: string;
}

export type RemoteResult =
  | { ok: true; output: string }
  | { ok: false; error: RemoteError };

export type LoadAverage = [number, number, number]; // 1, 5, 15 min

export interface GpuMemory {
  usedMb: number;
  totalMb: number;
  usedPercent: number;
}

export interface GpuProcess {
  pid: string;
  name: string;
  memoryMb: string; // as reported, may be "[N/A]"
}

export interface HostSnapshot {
  name: string;
  host: string;
  hasGpu: boolean;
  checkedAt: number; // epoch ms
  online: boolean;
  cpuUsage?: number;    // percent
  memoryUsage?: number; // percent
  loadAverage?: LoadAverage;
  gpuUsage?: number[];  // percent, one per device
  gpuMemory?: GpuMemory[];
  gpuProcesses?: GpuProcess[];
  error?: string;
  errorKind?: RemoteErrorKind;
  gpuError?: string;
  gpuErrorKind?: RemoteErrorKind;
}

export interface SelectionCriteria {
  needGpu?: boolean;
  maxCpu?: number;
  minMemoryGb?: number;
}
