/**
 * portwatch — Notification message formatting
 *
 * Telegram HTML. Every dynamic value is escaped.
 */

import type { ChangeReport, TargetConfig } from '../types/entities.js';
import type { ScheduleStats, TargetRunResult } from '../types/engine.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatTime(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function field(label: string, value: string | number): string {
  return `<b>${label}:</b> ${escapeHtml(String(value))}`;
}

function bannerFor(report: ChangeReport, port: number): string {
  return report.services[String(port)] ?? 'unknown';
}

export function formatScanStarted(target: TargetConfig, now: Date): string {
  return [
    '🔍 <b>Scan started</b>',
    '',
    field('Target', target.name),
    field('Range', target.target),
    field('Ports', target.ports),
    field('Time', formatTime(now)),
  ].join('\n');
}

export function formatTargetSummary(
  target: TargetConfig,
  reports: ChangeReport[],
  now: Date,
): string {
  const total = reports.reduce((sum, r) => sum + r.allPorts.length, 0);
  const lines = [
    '✅ <b>Scan complete</b>',
    '',
    field('Target', target.name),
    field('Range', target.target),
    field('Time', formatTime(now)),
    field('Open ports', total),
  ];

  if (total === 0) {
    lines.push('', 'No open ports found.');
    return lines.join('\n');
  }

  for (const report of reports) {
    const changed = new Map(report.changedServices.map((c) => [c.port, c]));
    lines.push('', `<b>${escapeHtml(report.address)}</b>`);
    for (const port of report.allPorts) {
      let suffix = '';
      if (report.newPorts.includes(port)) {
        suffix = ' [new]';
      } else {
        const change = changed.get(port);
        if (change) suffix = ` [changed, was: ${escapeHtml(change.previous)}]`;
      }
      lines.push(` - Port ${port}: ${escapeHtml(bannerFor(report, port))}${suffix}`);
    }
  }
  return lines.join('\n');
}

export function formatNewPorts(target: TargetConfig, report: ChangeReport, now: Date): string {
  const lines = [
    '🚨 <b>New open ports detected</b>',
    '',
    field('Target', target.name),
    field('IP', report.address),
    field('Time', formatTime(now)),
    '',
    `<b>New ports (${report.newPorts.length}):</b>`,
  ];
  for (const port of report.newPorts) {
    lines.push(` - Port ${port}: ${escapeHtml(bannerFor(report, port))}`);
  }
  return lines.join('\n');
}

export function formatChangedServices(
  target: TargetConfig,
  report: ChangeReport,
  now: Date,
): string {
  const lines = [
    '⚠️ <b>Service changes detected</b>',
    '',
    field('Target', target.name),
    field('IP', report.address),
    field('Time', formatTime(now)),
  ];
  for (const change of report.changedServices) {
    lines.push(
      '',
      `<b>Port ${change.port}</b>`,
      `  was: ${escapeHtml(change.previous)}`,
      `  now: ${escapeHtml(change.current)}`,
    );
  }
  return lines.join('\n');
}

export function formatRunComplete(results: TargetRunResult[], now: Date): string {
  const failed = results.filter((r) => r.error !== undefined);
  const reports = results.flatMap((r) => r.reports);
  const lines = [
    '🏁 <b>Run complete</b>',
    '',
    field('Targets', results.length),
    field('Failed targets', failed.length),
    field('Addresses', reports.length),
    field('Open ports', reports.reduce((sum, r) => sum + r.allPorts.length, 0)),
    field('New ports', reports.reduce((sum, r) => sum + r.newPorts.length, 0)),
    field('Changed services', reports.reduce((sum, r) => sum + r.changedServices.length, 0)),
    field('Time', formatTime(now)),
  ];
  for (const result of failed) {
    lines.push(` - ${escapeHtml(result.target.name)}: ${escapeHtml(result.error ?? '')}`);
  }
  return lines.join('\n');
}

export function formatScheduleStarted(
  targets: TargetConfig[],
  intervalHours: number,
  now: Date,
): string {
  return [
    '⏱ <b>Scheduled monitoring started</b>',
    '',
    field('Targets', targets.map((t) => t.name).join(', ')),
    field('Interval', `${intervalHours}h`),
    field('Time', formatTime(now)),
  ].join('\n');
}

export function formatScheduleStopped(stats: ScheduleStats, now: Date): string {
  return [
    '🛑 <b>Scheduled monitoring stopped</b>',
    '',
    field('Cycles', stats.cycles),
    field('Port checks', stats.portChecks),
    field('Running since', formatTime(new Date(stats.startedAt))),
    field('Time', formatTime(now)),
  ].join('\n');
}
