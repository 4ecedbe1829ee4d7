import type { ConfigStatus } from '../config/index.js';
import type { AlbumStats } from '../services/library/types.js';
import { LOG_LEVELS, type LogEntry, type LogLevel } from '../services/operations/activity.js';
import type { ManagerStatus } from '../services/operations/manager.js';
import { operationLabel, type OperationName, type OperationStatus } from '../services/operations/tracker.js';
import { escapeHtml } from '../utils/index.js';

export interface DashboardModel {
  config: ConfigStatus;
  status: ManagerStatus;
  entries: LogEntry[];
  totalEntries: number;
  level: LogLevel | null;
}

const STATUS_ICONS: Record<OperationStatus, string> = {
  idle: '⚪',
  running: '⏳',
  success: '✅',
  partial: '⚠️',
  error: '❌',
};

const STYLES = `
  body { font-family: system-ui, sans-serif; background: #121212; color: #eee; margin: 0; display: flex; }
  aside { width: 280px; padding: 1.5rem; background: #181818; min-height: 100vh; }
  main { flex: 1; padding: 1.5rem 2rem; }
  h1 { color: #1db954; }
  .card { background: #1e1e1e; border-radius: 10px; padding: 1.25rem; margin-bottom: 1rem; border-left: 4px solid #1db954; }
  .metrics { display: grid; grid-template-columns: repeat(3, 1fr); gap: 1rem; }
  .metric { background: #1e1e1e; border-radius: 8px; padding: 1rem; }
  button { background: #1db954; color: #fff; font-weight: bold; border: 0; padding: .6rem 1.2rem; border-radius: 5px; cursor: pointer; }
  button:disabled { background: #555; cursor: not-allowed; }
  button.secondary { background: #7f8c8d; }
  .tabs a { color: #3498db; margin-right: .75rem; }
  .tabs a.active { color: #fff; font-weight: bold; }
  .log-INFO { color: #3498db; } .log-SUCCESS { color: #2ecc71; } .log-WARNING { color: #f39c12; } .log-ERROR { color: #e74c3c; }
`;

function configured(ok: boolean): string {
  return ok ? '✅ Configured' : '❌ Missing';
}

function statsList(stats: AlbumStats): string {
  const rows: Array<[string, number]> = [
    ['Total Albums', stats.totalAlbums],
    ['Listened', stats.listenedAlbums],
    ['Rated', stats.ratedAlbums],
    ['Unrated', stats.unratedAlbums],
    ['With Covers', stats.albumsWithCovers],
    ['With Icons', stats.albumsWithIcons],
  ];
  return `<dl>${rows.map(([label, value]) => `<dt>${label}</dt><dd>${value}</dd>`).join('')}</dl>`;
}

function renderSidebar(model: DashboardModel): string {
  const { config, status } = model;
  const disabled = status.isRunning ? ' disabled' : '';
  const lastOperation = status.lastOperation
    ? `<p>Last: ${escapeHtml(operationLabel(status.lastOperation))}</p>`
    : '<p>No operations yet</p>';

  return `<aside>
  <h2>🎵 Settings</h2>
  <h3>API Status</h3>
  <p><strong>Notion API:</strong> ${configured(config.notionApiKey)}</p>
  <p><strong>Album Database:</strong> ${configured(config.notionDatabase)}</p>
  <p><strong>Spotify API:</strong> ${configured(config.spotify)}</p>
  <hr>
  <h3>Recent Operations</h3>
  ${lastOperation}
  <hr>
  <h3>Database Info</h3>
  <form method="post" action="/actions/stats"><button type="submit"${disabled}>📊 Update Stats</button></form>
  ${status.stats ? statsList(status.stats) : "<p>Click 'Update Stats' to load database information</p>"}
  <hr>
  <h3>Actions</h3>
  <form method="post" action="/actions/reset"><button class="secondary" type="submit">🔄 Reset Status</button></form>
  <form method="post" action="/actions/clear-logs"><button class="secondary" type="submit">🗑️ Clear Logs</button></form>
  <form method="post" action="/actions/prune-ranks"><button class="secondary" type="submit"${disabled}>🧹 Prune Rank Options</button></form>
</aside>`;
}

function renderOverview(statuses: Record<OperationName, OperationStatus>): string {
  const items: OperationName[] = ['set_covers', 'sort_albums', 'prune_ranks'];
  return `<div class="metrics">${items
    .map(
      (name) =>
        `<div class="metric"><div>${escapeHtml(operationLabel(name))}</div><div title="${statuses[name]}">${STATUS_ICONS[statuses[name]]}</div></div>`
    )
    .join('')}</div>`;
}

function renderCoversCard(model: DashboardModel): string {
  const { stats, isRunning } = model.status;
  const summary = stats
    ? `<p>${stats.albumsWithCovers}/${stats.totalAlbums} albums have covers, ${stats.albumsWithIcons}/${stats.totalAlbums} have icons</p>`
    : '';

  return `<section class="card">
  <h3>🎨 Update Album Covers</h3>
  <p>Fetch album artwork from Spotify and set it as the page cover and icon.</p>
  <form method="post" action="/actions/covers">
    <label><input type="radio" name="mode" value="missing" checked> Add missing only</label>
    <label><input type="radio" name="mode" value="all"> Update all (overwrite existing)</label>
    ${summary}
    <button type="submit"${isRunning ? ' disabled' : ''}>🎨 Run Decorator</button>
  </form>
</section>`;
}

function renderSortCard(model: DashboardModel): string {
  const { stats, isRunning } = model.status;
  const unrated = stats ? `<p>Found ${stats.unratedAlbums} unrated albums</p>` : '';

  return `<section class="card">
  <h3>📊 Sort Albums</h3>
  <p>Rank albums and write the ranking back to the database.</p>
  <form method="post" action="/actions/sort">
    <label>Sort by
      <select name="key">
        <option value="rank">Existing rank</option>
        <option value="title">Title</option>
        <option value="artist">Artist</option>
      </select>
    </label>
    <label>Direction
      <select name="direction">
        <option value="asc">Ascending</option>
        <option value="desc">Descending (title / artist)</option>
      </select>
    </label>
    <label><input type="checkbox" name="compact"> Compact ranking</label>
    <label><input type="checkbox" name="listenedOnly" checked> Listened albums only</label>
    <label>Starting rank <input type="number" name="startingRank" min="1" value="1"></label>
    ${unrated}
    <button type="submit"${isRunning ? ' disabled' : ''}>📈 Run Sorter</button>
  </form>
</section>`;
}

function renderLog(model: DashboardModel): string {
  const tabs = [
    `<a href="/"${model.level === null ? ' class="active"' : ''}>All</a>`,
    ...LOG_LEVELS.map(
      (level) => `<a href="/?level=${level}"${model.level === level ? ' class="active"' : ''}>${level}</a>`
    ),
  ].join('');

  const lines =
    model.entries.length === 0
      ? `<p>${model.level ? `No ${model.level} logs` : 'No logs yet'}</p>`
      : model.entries
          .map(
            (entry) =>
              `<div class="log-${entry.level}">[${escapeHtml(entry.timestamp)}] [${entry.level}] ${escapeHtml(entry.message)}</div>`
          )
          .join('\n');

  return `<section>
  <h2>Activity Log</h2>
  <nav class="tabs">${tabs}</nav>
  <div class="log">${lines}</div>
</section>`;
}

function renderFooter(model: DashboardModel): string {
  const state = model.status.isRunning ? '⏳ Operation in progress...' : '✅ Ready for operations';
  const last = model.status.lastOperation ?? 'None';
  return `<footer><hr><p>${state}</p><p>Total logs: ${model.totalEntries} | Last operation: ${escapeHtml(last)}</p></footer>`;
}

export function renderDashboard(model: DashboardModel): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>🎵 Album Desk</title>
<style>${STYLES}</style>
</head>
<body>
${renderSidebar(model)}
<main>
<h1>🎵 Album Desk</h1>
${renderOverview(model.status.statuses)}
${renderCoversCard(model)}
${renderSortCard(model)}
${renderLog(model)}
${renderFooter(model)}
</main>
</body>
</html>`;
}
