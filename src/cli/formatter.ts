/**
 * mediasync output formatter
 *
 * Formats sessions, events and config into human-readable strings for CLI output.
 */

import type { MediaSyncConfig } from '../config/config.js';
import { ErrorHandler } from '../errors/error-handler.js';
import { MediaSyncError } from '../errors/sync-error.js';
import type { SyncEvent } from '../events/types.js';
import type { RemoteSession } from '../models/types.js';
import type { ServerInfo } from '../transport/types.js';

/** What `mediasync status` reports. */
export interface ServerStatus {
  server: ServerInfo;
  url: string;
  sessionCount: number;
  controllableCount: number;
  latencyMs: number;
}

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

/** 75 → "1:15", 3725 → "1:02:05" */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = String(seconds % 60).padStart(2, '0');
  return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${s}` : `${m}:${s}`;
}

function describeItem(session: RemoteSession): string {
  const item = session.nowPlaying;
  if (!item) return `${DIM}idle${RESET}`;

  let title = item.title;
  if (item.seriesName) {
    const episode =
      item.seasonNumber !== undefined && item.episodeNumber !== undefined
        ? ` S${String(item.seasonNumber).padStart(2, '0')}E${String(item.episodeNumber).padStart(2, '0')}`
        : '';
    title = `${item.seriesName}${episode} · ${item.title}`;
  } else if (item.artists.length > 0) {
    title = `${item.artists.join(', ')} · ${item.title}`;
  }

  const playback = session.playback;
  if (!playback) return title;
  const position =
    item.durationSeconds !== undefined
      ? `${formatDuration(playback.positionSeconds)} / ${formatDuration(item.durationSeconds)}`
      : formatDuration(playback.positionSeconds);
  return `${title} ${DIM}[${position}]${RESET}${playback.paused ? ' ⏸' : ''}`;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) return [...value];
  if (value instanceof MediaSyncError) return { name: value.name, code: value.code, message: value.message };
  return value;
}

export class OutputFormatter {
  /**
   * Format the session map into a list display.
   */
  formatSessionList(sessions: RemoteSession[]): string {
    if (!sessions.length) {
      return `${YELLOW}No controllable sessions found.${RESET}`;
    }
    const lines: string[] = [header(`Sessions (${sessions.length})`)];
    sessions.forEach((session, i) => {
      const version = session.applicationVersion ? ` ${session.applicationVersion}` : '';
      lines.push(
        `  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${BOLD}${session.displayName}${RESET} ${DIM}(${session.clientApplication}${version})${RESET}`
      );
      lines.push(`       ${DIM}Device: ${session.deviceKey} | User: ${session.userName ?? '-'}${RESET}`);
      lines.push(`       ${describeItem(session)}`);
    });
    return lines.join('\n');
  }

  /**
   * One line per coordinator event, for `mediasync watch`.
   */
  formatEvent(event: SyncEvent): string {
    switch (event.type) {
      case 'added':
        return `${GREEN}+${RESET} ${event.session.displayName} (${event.deviceKey}) ${describeItem(event.session)}`;
      case 'removed':
        return `${RED}-${RESET} ${event.lastKnown.displayName} (${event.deviceKey}) ${DIM}${event.reason}${RESET}`;
      case 'playbackChanged':
        return `${CYAN}▶${RESET} ${event.session.displayName}: ${event.transition} ${describeItem(event.session)}`;
      case 'libraryChanged': {
        const { change } = event;
        return (
          `${YELLOW}≡${RESET} Library changed: +${change.itemsAdded.length} ~${change.itemsUpdated.length} ` +
          `-${change.itemsRemoved.length} (${event.invalidatedEntries} cached page(s) dropped)`
        );
      }
      case 'notification': {
        const description = event.notification.description ? `: ${event.notification.description}` : '';
        return `${YELLOW}!${RESET} ${event.notification.name}${description}`;
      }
      case 'userDataChanged':
        return `${DIM}·${RESET} User data changed for ${event.items.length} item(s)`;
      case 'userChanged':
        return `${DIM}·${RESET} User ${event.userName ?? event.userId} ${event.change}`;
      case 'serverLifecycle':
        return `${YELLOW}!${RESET} Server ${event.phase}`;
      case 'connectionChanged':
        return `${DIM}·${RESET} Push ${event.previous} → ${event.state}`;
      case 'availabilityChanged':
        return event.available
          ? `${GREEN}✓${RESET} Server reachable again`
          : `${RED}✗${RESET} Server unreachable after ${event.consecutiveFailures} failed polls`;
      case 'pollingChanged':
        return event.suspended
          ? `${DIM}·${RESET} Polling suspended while push is steady`
          : `${DIM}·${RESET} Polling resumed`;
      case 'authenticationFailed':
        return `${RED}✗${RESET} Authentication rejected (${event.source}); sync paused`;
    }
  }

  /** Event as a single JSON line, for `mediasync watch --json`. */
  formatEventJson(event: SyncEvent): string {
    return JSON.stringify(event, jsonReplacer);
  }

  /**
   * Format the server status overview.
   */
  formatStatus(status: ServerStatus): string {
    const lines: string[] = [header('mediasync Status')];
    lines.push(field('Server', `${GREEN}✓ ${status.server.name}${RESET}`));
    lines.push(field('Version', status.server.version));
    lines.push(field('URL', status.url));
    lines.push(field('Latency', `${status.latencyMs}ms`));
    lines.push(field('Sessions', status.sessionCount));
    lines.push(field('Controllable', status.controllableCount));
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format a config for display. Callers pass an already-redacted copy.
   */
  formatConfig(config: MediaSyncConfig, configPath: string): string {
    const lines: string[] = [header('mediasync Config')];
    lines.push(field('File', configPath));
    lines.push(field('Server', `${config.server.ssl ? 'https' : 'http'}://${config.server.host || '<unset>'}:${config.server.port}`));
    lines.push(field('API key', config.server.apiKey || '<unset>'));
    lines.push(field('Device id', config.server.deviceId));
    lines.push(field('Poll interval', `${config.sync.pollIntervalSeconds}s`));
    lines.push(field('Push', config.sync.pushEnabled ? `on (poll every ${config.sync.pushPollIntervalSeconds}s)` : 'off'));
    lines.push(field('Failure threshold', config.sync.failureThreshold));
    lines.push(field('Excluded devices', config.sync.excludedDevices.join(', ') || '-'));
    lines.push(field('Cache', `${config.cache.maxEntries} entries, ${config.cache.ttlSeconds}s TTL`));
    lines.push(field('Log level', config.logging.level));
    return lines.filter(Boolean).join('\n');
  }

  formatValidation(result: { valid: boolean; errors: string[] }): string {
    if (result.valid) {
      return `${GREEN}✓ Configuration is valid${RESET}`;
    }
    return [`${RED}✗ Configuration has ${result.errors.length} problem(s):${RESET}`, ...result.errors.map((e) => `  • ${e}`)].join('\n');
  }

  /**
   * Format an error with a hint for the common failure kinds.
   */
  formatError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${message}`];
    const hint = ErrorHandler.hintFor(error);
    if (hint) lines.push(`${YELLOW}Hint:${RESET} ${hint}`);
    return lines.join('\n');
  }
}
