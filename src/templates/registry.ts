/**
 * Project file registry.
 *
 * Declares every file of the generated PWA skeleton and assembles the
 * ScaffoldPlan the materializer writes. Pure data: no I/O happens here.
 */

import { VERSION } from '../version.js';
import { deriveDirectories } from '../scaffold/paths.js';
import { ScaffoldError } from '../core/errors.js';
import type { FileManifest, ScaffoldPlan } from '../core/types.js';
import type { TemplateContext, TemplateFile } from './types.js';
import { mainCss, uiCss } from './styles.js';
import { indexHtml } from './markup.js';
import { serviceWorker, webManifest, precacheList } from './pwa.js';
import { readme, gitignore } from './docs.js';
import { placeholderIcon } from './icon.js';
import { mainJs, gameLoopJs, rendererJs, inputManagerJs, audioManagerJs, assetLoaderJs } from './scripts/engine.js';
import { storeJs, saveSystemJs, settingsJs, scoreboardJs } from './scripts/state.js';
import { sceneManagerJs, menuSceneJs, gameSceneJs } from './scripts/scenes.js';
import { uiManagerJs, errorDisplayJs } from './scripts/ui.js';
import { mathUtilsJs, domUtilsJs, errorHandlerJs } from './scripts/utils.js';

/** Empty directories created even though no file lands in them */
export const ASSET_DIRECTORIES = [
  'assets/icons',
  'assets/audio',
  'assets/textures',
  'assets/models',
  'assets/shaders',
] as const;

export const PROJECT_FILES: readonly TemplateFile[] = [
  // ─── Root ─────────────────────────────────────────────
  { path: 'index.html', render: indexHtml, essential: true },
  { path: 'manifest.json', render: webManifest, essential: true },
  { path: 'service-worker.js', render: serviceWorker, essential: true },
  { path: 'README.md', render: readme },

  // ─── Styles ───────────────────────────────────────────
  { path: 'css/main.css', render: mainCss },
  { path: 'css/ui.css', render: uiCss },

  // ─── Engine ───────────────────────────────────────────
  { path: 'js/main.js', render: mainJs },
  { path: 'js/core/GameLoop.js', render: gameLoopJs },
  { path: 'js/core/Renderer.js', render: rendererJs },
  { path: 'js/core/InputManager.js', render: inputManagerJs },
  { path: 'js/core/AudioManager.js', render: audioManagerJs },
  { path: 'js/core/AssetLoader.js', render: assetLoaderJs },

  // ─── State ────────────────────────────────────────────
  { path: 'js/state/Store.js', render: storeJs },
  { path: 'js/state/SaveSystem.js', render: saveSystemJs },
  { path: 'js/state/Settings.js', render: settingsJs },
  { path: 'js/state/Scoreboard.js', render: scoreboardJs },

  // ─── Scenes ───────────────────────────────────────────
  { path: 'js/scenes/SceneManager.js', render: sceneManagerJs },
  { path: 'js/scenes/MenuScene.js', render: menuSceneJs },
  { path: 'js/scenes/GameScene.js', render: gameSceneJs },

  // ─── UI ───────────────────────────────────────────────
  { path: 'js/ui/UIManager.js', render: uiManagerJs },
  { path: 'js/ui/ErrorDisplay.js', render: errorDisplayJs },

  // ─── Utilities ────────────────────────────────────────
  { path: 'js/utils/MathUtils.js', render: mathUtilsJs },
  { path: 'js/utils/DOMUtils.js', render: domUtilsJs },
  { path: 'js/utils/ErrorHandler.js', render: errorHandlerJs },

  // ─── Auxiliary ────────────────────────────────────────
  { path: 'assets/icons/icon-192x192.png', render: placeholderIcon, auxiliary: true },
  { path: '.gitignore', render: gitignore, auxiliary: true },
];

export function buildScaffoldPlan(
  displayName: string,
  canonicalName: string,
  files: readonly TemplateFile[] = PROJECT_FILES,
): ScaffoldPlan {
  const ctx: TemplateContext = {
    displayName,
    canonicalName,
    generatorVersion: VERSION,
    // Auxiliary files are best-effort; a missing one must not break install
    precache: precacheList(files.filter(f => !f.auxiliary).map(f => f.path)),
  };
  const main: FileManifest = new Map();
  const auxiliary: FileManifest = new Map();
  const essentials = new Set<string>();

  for (const file of files) {
    const target = file.auxiliary ? auxiliary : main;
    if (main.has(file.path) || auxiliary.has(file.path)) {
      throw new ScaffoldError(`Duplicate template path: ${file.path}`, 'DUPLICATE_PATH', 'plan');
    }
    target.set(file.path, file.render(ctx));
    if (file.essential) essentials.add(file.path);
  }

  return {
    files: main,
    auxiliary,
    directories: deriveDirectories([main, auxiliary], ASSET_DIRECTORIES),
    essentials,
  };
}
