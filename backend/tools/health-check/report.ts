// backend/tools/health-check/report.ts
/**
 * Human-readable health-check output (stdout). Pure string builders so the
 * exact lines are testable.
 */

import type { HealthCheckResult, HealthReport } from "../../shared/src/health/types";

export const SEPARATOR = "========================================";

const MAX_BODY_CHARS = 2000;

export function formatHeader(startedAt: Date): string {
  return [`开始服务器健康检查 ${startedAt.toISOString()}`, SEPARATOR].join("\n");
}

export function formatBody(data: unknown): string[] {
  if (data === undefined || data === null || data === "") return [];
  const text = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  return [
    text.length > MAX_BODY_CHARS ? `${text.slice(0, MAX_BODY_CHARS)}…` : text,
  ];
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function formatProbe(r: HealthCheckResult): string {
  const lines = ["", SEPARATOR, `测试: ${r.label}`];
  const d = r.details;

  if (!d) {
    lines.push("", `[错误] 请求失败! (${r.errorCode ?? "unknown"})`, "错误详情:", r.error ?? "");
    return lines.join("\n");
  }

  lines.push(`URL: ${d.url}`, `方法: ${d.method}`);
  if (d.bodyMasked) lines.push("请求体: *****");

  if (d.status === 0) {
    lines.push("", `[错误] 请求失败! (${r.errorCode ?? "network_error"})`, "错误详情:", r.error ?? "");
    return lines.join("\n");
  }

  lines.push(...formatBody(d.response), `状态码: ${d.status}`);
  if (!isSuccessStatus(d.status)) {
    lines.push(`[警告] 非成功状态码: ${d.status}`);
    return lines.join("\n");
  }

  lines.push(`[成功] 请求返回状态码: ${d.status}`);
  if (d.task) {
    lines.push(`任务 ${d.task.id}: ${d.task.state ?? "unknown"} (轮询 ${d.task.polls} 次)`);
  }
  if (!r.ok) {
    lines.push(`[错误] ${r.error ?? "probe failed"} (${r.errorCode ?? "unknown"})`);
  }
  return lines.join("\n");
}

export function formatSummary(report: HealthReport): string {
  const lines = ["", SEPARATOR, "健康检查汇总:"];
  for (const c of report.checks) {
    lines.push(`${c.label}: ${c.ok ? "通过" : "失败"}`);
  }
  lines.push("");

  if (report.status === "ok") {
    lines.push("[√] 所有测试通过! 服务器状态正常");
  } else if (report.status === "degraded") {
    const failed = report.checks.filter((c) => !c.ok).map((c) => c.label);
    lines.push(`[√] 关键测试通过! 非关键测试失败: ${failed.join(", ")}`);
  } else {
    lines.push("[!] 健康检查未通过! 请检查服务器状态");
  }
  return lines.join("\n");
}
