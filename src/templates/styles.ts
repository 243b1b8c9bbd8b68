/**
 * Stylesheets for the generated app: layer layout in main.css, components in ui.css.
 */

export function mainCss(): string {
  return `/* Layout and theme */
:root {
    --bg-color: #111111;
    --text-color: #f5f5f5;
    --muted-color: #777777;
    --accent-color: #e96714;
    --border-color: #444444;
    --panel-bg: rgba(20, 20, 20, 0.95);
    --font-main: 'Montserrat', system-ui, sans-serif;
}

@media (prefers-color-scheme: dark) {
    :root {
        --bg-color: #111111;
        --text-color: #f5f5f5;
        --panel-bg: rgba(20, 20, 20, 0.95);
    }
}

@media (prefers-color-scheme: light) {
    :root {
        --bg-color: #f2f2f2;
        --text-color: #1a1a1a;
        --muted-color: #555555;
        --border-color: #cccccc;
        --panel-bg: rgba(255, 255, 255, 0.95);
    }
}

* {
    box-sizing: border-box;
    margin: 0;
    padding: 0;
    user-select: none;
    -webkit-tap-highlight-color: transparent;
}

body {
    background-color: var(--bg-color);
    color: var(--text-color);
    font-family: var(--font-main);
    width: 100vw;
    height: 100vh;
    height: 100dvh;
    overflow: hidden;
    position: fixed;
}

/* Layer 0: canvas */
#game-canvas {
    position: absolute;
    inset: 0;
    width: 100%;
    height: 100%;
    z-index: 0;
    display: block;
}

/* Layer 1: UI overlay */
#ui-layer {
    position: absolute;
    inset: 0;
    z-index: 10;
    pointer-events: none;
}

#ui-layer > * { pointer-events: auto; }

/* Layer 2: loading screen */
#loading-layer {
    position: fixed;
    inset: 0;
    background: var(--bg-color);
    z-index: 9999;
    display: flex;
    flex-direction: column;
    justify-content: center;
    align-items: center;
    transition: opacity 0.5s ease;
}

#loading-layer.fade-out {
    opacity: 0;
    pointer-events: none;
}

#rotate-overlay {
    display: none;
    position: fixed;
    inset: 0;
    background: #000000;
    color: #ffffff;
    z-index: 9998;
    flex-direction: column;
    justify-content: center;
    align-items: center;
    text-align: center;
    letter-spacing: 2px;
    text-transform: uppercase;
}

@media screen and (orientation: portrait) and (max-width: 768px) {
    /* Uncomment to require landscape on phones */
    /* #rotate-overlay { display: flex; } */
}

@media (prefers-reduced-motion: reduce) {
    * { transition: none !important; animation: none !important; }
}
`;
}

export function uiCss(): string {
  return `/* UI components */

.hidden { display: none !important; }

.mt-auto { margin-top: auto; }

.loader-spinner {
    width: 50px;
    height: 50px;
    border: 3px solid rgba(255, 255, 255, 0.1);
    border-radius: 50%;
    border-top-color: var(--accent-color);
    animation: spin 1s ease-in-out infinite;
    margin-bottom: 20px;
}

@keyframes spin { to { transform: rotate(360deg); } }

.loading-text {
    font-size: 0.8rem;
    letter-spacing: 2px;
    text-transform: uppercase;
    color: var(--muted-color);
}

.panel {
    background: var(--panel-bg);
    border: 1px solid var(--border-color);
    backdrop-filter: blur(10px);
    border-radius: 4px;
    box-shadow: 0 10px 30px rgba(0, 0, 0, 0.5);
    text-align: center;
}

.menu-card,
.modal-card {
    position: absolute;
    top: 50%;
    left: 50%;
    transform: translate(-50%, -50%);
    display: flex;
    flex-direction: column;
    gap: 12px;
    padding: 32px;
    width: min(90vw, 360px);
}

.modal-card {
    width: min(90vw, 480px);
    max-height: 80vh;
    z-index: 20;
}

.modal-content {
    overflow-y: auto;
    text-align: left;
    line-height: 1.5;
}

.modal-content h3 {
    color: var(--accent-color);
    margin: 12px 0 4px;
}

.menu-title {
    font-size: 2rem;
    font-weight: 800;
    letter-spacing: 3px;
    text-transform: uppercase;
    margin-bottom: 12px;
}

.btn {
    font: inherit;
    padding: 12px 16px;
    background: transparent;
    color: var(--text-color);
    border: 1px solid var(--border-color);
    border-radius: 4px;
    text-transform: uppercase;
    letter-spacing: 2px;
    cursor: pointer;
    transition: border-color 0.2s ease, color 0.2s ease;
}

.btn:hover,
.btn:focus-visible {
    border-color: var(--accent-color);
    color: var(--accent-color);
    outline: none;
}

.btn.danger:hover { border-color: #cc3333; color: #cc3333; }

.icon-btn {
    width: 44px;
    height: 44px;
    font-size: 1.4rem;
    background: var(--panel-bg);
    color: var(--text-color);
    border: 1px solid var(--border-color);
    border-radius: 50%;
    cursor: pointer;
}

.hud-bar {
    position: absolute;
    top: 16px;
    right: 16px;
    display: flex;
    gap: 8px;
}

/* Settings sidebar */
.sidebar {
    position: fixed;
    top: 0;
    bottom: 0;
    width: min(85vw, 320px);
    padding: 24px;
    display: flex;
    flex-direction: column;
    gap: 16px;
    background: var(--panel-bg);
    border: 1px solid var(--border-color);
    z-index: 30;
    transition: transform 0.3s ease;
}

.sidebar.right { right: 0; transform: translateX(100%); }
.sidebar.left { left: 0; transform: translateX(-100%); }
.sidebar.active { transform: translateX(0); }

.sidebar-header {
    display: flex;
    justify-content: space-between;
    align-items: center;
}

.sidebar-close {
    background: none;
    border: none;
    color: var(--muted-color);
    font-size: 1.5rem;
    cursor: pointer;
}

.sidebar-backdrop {
    position: fixed;
    inset: 0;
    background: rgba(0, 0, 0, 0.5);
    opacity: 0;
    pointer-events: none;
    transition: opacity 0.3s ease;
    z-index: 25;
}

.sidebar-backdrop.active { opacity: 1; pointer-events: auto; }

.setting-row {
    display: flex;
    justify-content: space-between;
    align-items: center;
    gap: 12px;
}

.toggle-switch { position: relative; width: 44px; height: 24px; }
.toggle-switch input { opacity: 0; width: 0; height: 0; }

.toggle-switch .slider {
    position: absolute;
    inset: 0;
    background: var(--border-color);
    border-radius: 24px;
    cursor: pointer;
    transition: background 0.2s ease;
}

.toggle-switch .slider::before {
    content: '';
    position: absolute;
    width: 18px;
    height: 18px;
    left: 3px;
    top: 3px;
    background: #ffffff;
    border-radius: 50%;
    transition: transform 0.2s ease;
}

.toggle-switch input:checked + .slider { background: var(--accent-color); }
.toggle-switch input:checked + .slider::before { transform: translateX(20px); }

.score-table { width: 100%; border-collapse: collapse; }
.score-table td { padding: 10px; border-bottom: 1px solid var(--border-color); }
.score-table td:last-child { text-align: right; }

#error-toaster {
    display: none;
    position: fixed;
    bottom: 16px;
    left: 50%;
    transform: translateX(-50%);
    padding: 12px 20px;
    background: #cc3333;
    color: #ffffff;
    border-radius: 4px;
    z-index: 10000;
}
`;
}
