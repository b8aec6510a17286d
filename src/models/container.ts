export const CONTAINER_ACTIONS = ["start", "stop", "restart"] as const;

export type ContainerAction = (typeof CONTAINER_ACTIONS)[number];

export type ContainerStatus = "running" | "exited" | "created" | "paused" | "restarting" | string;

export type ContainerHandle = {
  id: string;
  name: string;
  status: ContainerStatus;
  hostPort: string | null;
};

export type ContainerSummary = {
  name: string;
  status: ContainerStatus;
  link: string | null;
  cpu: number | null;
  mem_mb: number | null;
};

export type ContainerMetrics = {
  cpu: number | null;
  mem_mb: number | null;
};

export type CpuUsage = {
  total_usage?: unknown;
  percpu_usage?: unknown;
};

export type CpuStats = {
  cpu_usage?: CpuUsage;
  system_cpu_usage?: unknown;
  online_cpus?: unknown;
};

export type RawStats = {
  cpu_stats?: CpuStats;
  precpu_stats?: CpuStats;
  memory_stats?: {
    usage?: unknown;
    limit?: unknown;
  };
};

export type ContainersMessage = {
  type: "containers";
  containers: ContainerSummary[];
};

export type Snapshot = {
  capturedAt: number;
  payload: string;
  containers: ContainerSummary[];
};

export type ExecProfile = "docker" | "wsl";

export type ExecCommand = {
  profile: ExecProfile;
  command: string;
};

export function isContainerAction(value: unknown): value is ContainerAction {
  return typeof value === "string" && CONTAINER_ACTIONS.some((a) => a === value);
}
