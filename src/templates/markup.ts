import type { TemplateContext } from './types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

const CSP = [
  "default-src 'self'",
  "style-src 'self'",
  "script-src 'self'",
  "img-src 'self' data:",
  "connect-src 'self'",
].join('; ');

export function indexHtml(ctx: TemplateContext): string {
  const title = escapeHtml(ctx.displayName);

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0, maximum-scale=1.0, user-scalable=no">
    <meta http-equiv="Content-Security-Policy" content="${CSP}">
    <meta name="generator" content="create-pwa-game v${ctx.generatorVersion}">
    <meta name="theme-color" content="#e96714">
    <title>${title}</title>

    <link rel="manifest" href="manifest.json">
    <link rel="icon" href="assets/icons/icon-192x192.png">
    <link rel="apple-touch-icon" href="assets/icons/icon-192x192.png">

    <link rel="stylesheet" href="css/main.css">
    <link rel="stylesheet" href="css/ui.css">
</head>
<body>

    <div id="loading-layer">
        <div class="loader-spinner"></div>
        <div class="loading-text">Loading Assets...</div>
    </div>

    <div id="rotate-overlay">
        <p>Please rotate your device</p>
    </div>

    <canvas id="game-canvas"></canvas>

    <div id="ui-layer">

        <div id="sidebar-backdrop" class="sidebar-backdrop"></div>

        <div id="menu-scene" class="menu-card panel hidden" role="navigation" aria-label="Main menu">
            <h1 class="menu-title">${title}</h1>
            <button id="btn-start" class="btn" aria-label="Start game">Start</button>
            <button id="btn-highscores" class="btn" aria-label="View high scores">High Scores</button>
            <button id="btn-settings-menu" class="btn" aria-label="Open settings">Settings</button>
            <button id="btn-about" class="btn" aria-label="About this game">About</button>
            <button id="btn-help" class="btn" aria-label="View help and controls">Help</button>
            <div id="version-display" class="loading-text">v1.0.0</div>
        </div>

        <div id="modal-highscores" class="modal-card panel hidden" role="dialog" aria-modal="true" aria-labelledby="highscores-title">
            <h2 id="highscores-title" class="menu-title">High Scores</h2>
            <div class="modal-content">
                <table class="score-table">
                    <tbody id="score-rows"></tbody>
                </table>
            </div>
            <button id="btn-close-scores" class="btn mt-auto">Close</button>
        </div>

        <div id="modal-about" class="modal-card panel hidden" role="dialog" aria-modal="true" aria-labelledby="about-title">
            <h2 id="about-title" class="menu-title">About</h2>
            <div class="modal-content">
                <h3>The Project</h3>
                <p>Built on a small vanilla JavaScript framework: ES modules, no build step, installable and playable offline.</p>
                <h3>Credits</h3>
                <p>Development: Your Name</p>
            </div>
            <button id="btn-close-about" class="btn mt-auto">Close</button>
        </div>

        <div id="modal-help" class="modal-card panel hidden" role="dialog" aria-modal="true" aria-labelledby="help-title">
            <h2 id="help-title" class="menu-title">Help</h2>
            <div class="modal-content">
                <h3>How to Play</h3>
                <p>Use the mouse, touch or keyboard to interact with the game world.</p>
                <h3>Controls</h3>
                <p>Click or tap: interact. Gear button: settings. Esc: close dialogs.</p>
                <h3>Troubleshooting</h3>
                <p>No sound? Check that sound is enabled in the settings sidebar.</p>
            </div>
            <button id="btn-close-help" class="btn mt-auto">Close</button>
        </div>

        <div id="game-hud" class="hud-bar hidden">
            <button id="btn-sidebar-toggle" class="icon-btn" aria-label="Open settings sidebar">&#9881;</button>
        </div>

        <div id="settings-sidebar" class="sidebar right" role="complementary" aria-label="Settings panel">
            <div class="sidebar-header">
                <h2>Settings</h2>
                <button id="btn-sidebar-close" class="sidebar-close" aria-label="Close settings">&times;</button>
            </div>

            <div class="setting-row">
                <label for="sel-sidebar-side">Sidebar Side</label>
                <select id="sel-sidebar-side">
                    <option value="right" selected>Right</option>
                    <option value="left">Left</option>
                </select>
            </div>

            <div class="setting-row">
                <span>Sound</span>
                <label class="toggle-switch">
                    <input type="checkbox" id="chk-sound" checked aria-label="Sound on or off">
                    <span class="slider"></span>
                </label>
            </div>

            <div class="setting-row">
                <label for="rng-volume">Master Volume</label>
                <input type="range" id="rng-volume" min="0" max="1" step="0.1" value="1">
            </div>

            <button id="btn-return-menu" class="btn danger mt-auto">Return to Main Menu</button>
        </div>

    </div>

    <script type="module" src="./js/main.js"></script>
</body>
</html>
`;
}
