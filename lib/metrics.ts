import { JOB_STAGES, type JobStage } from "../src/domain/types";

export function formatMetricLine(name: string, value: number, labels?: Record<string, string>) {
  if (!labels || Object.keys(labels).length === 0) {
    return `${name} ${value}`;
  }
  const serialized = Object.entries(labels)
    .map(([key, val]) => `${key}="${val.replaceAll("\\", "\\\\").replaceAll("\"", "\\\"")}"`)
    .join(",");
  return `${name}{${serialized}} ${value}`;
}

function gauge(lines: string[], name: string, help: string, value: number) {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} gauge`);
  lines.push(formatMetricLine(name, value));
}

export function renderStageMetrics(counts: Record<JobStage, number>) {
  const lines = ["# HELP clipforge_jobs Jobs currently in each stage.", "# TYPE clipforge_jobs gauge"];
  for (const stage of JOB_STAGES) {
    lines.push(formatMetricLine("clipforge_jobs", counts[stage], { stage }));
  }
  return lines;
}

export function renderProcessMetrics() {
  const mem = process.memoryUsage();
  const uptime = process.uptime();
  const cpu = process.cpuUsage();
  const lines: string[] = [];

  gauge(lines, "process_uptime_seconds", "Process uptime in seconds.", uptime);
  gauge(lines, "process_start_time_seconds", "Process start time in seconds since epoch.", Math.floor(Date.now() / 1000 - uptime));
  gauge(lines, "process_resident_memory_bytes", "Resident memory size in bytes.", mem.rss);
  gauge(lines, "process_heap_used_bytes", "Process heap used in bytes.", mem.heapUsed);

  lines.push("# HELP process_cpu_user_seconds_total Total user CPU time spent in seconds.");
  lines.push("# TYPE process_cpu_user_seconds_total counter");
  lines.push(formatMetricLine("process_cpu_user_seconds_total", cpu.user / 1e6));

  lines.push("# HELP clipforge_build_info Build metadata for ClipForge.");
  lines.push("# TYPE clipforge_build_info gauge");
  lines.push(formatMetricLine("clipforge_build_info", 1, { node: process.version }));
  return lines;
}
