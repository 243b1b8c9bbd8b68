import type { TemplateContext } from './types.js';

export const GITIGNORE_ENTRIES = [
  'node_modules/',
  'dist/',
  '.DS_Store',
  'Thumbs.db',
  '*.log',
  '.vscode/',
  '.idea/',
  '*.swp',
  '.env',
] as const;

export function gitignore(): string {
  return GITIGNORE_ENTRIES.join('\n') + '\n';
}

export function readme(ctx: TemplateContext): string {
  const fence = '```';

  return `# ${ctx.displayName}

A zero-dependency Progressive Web App game skeleton: plain ES modules, no build
step, installable and playable offline.

## Quick start

Any static file server works. From this directory:

${fence}bash
npx serve -l 8000 .
# or
python3 -m http.server 8000
${fence}

Then open http://localhost:8000. Service workers need \`localhost\` or HTTPS.

## Layout

${fence}
${ctx.canonicalName}/
├── index.html            entry page, UI overlay and dialogs
├── manifest.json         web-app manifest
├── service-worker.js     offline cache (${ctx.canonicalName}-v<N>)
├── css/
│   ├── main.css          layers, theme, light/dark scheme
│   └── ui.css            buttons, dialogs, sidebar
├── js/
│   ├── main.js           boot sequence and asset list
│   ├── core/             GameLoop, Renderer, InputManager, AudioManager, AssetLoader
│   ├── state/            Store, SaveSystem, Settings, Scoreboard
│   ├── scenes/           SceneManager, MenuScene, GameScene
│   ├── ui/               UIManager, ErrorDisplay
│   └── utils/            MathUtils, DOMUtils, ErrorHandler
└── assets/
    ├── icons/  audio/  textures/  models/  shaders/
${fence}

## Writing the game

- Put game logic in \`js/scenes/GameScene.js\`: \`enter\`, \`update(dt)\`,
  \`render(ctx)\` and \`exit\` are called by \`SceneManager\`.
- Add scenes by registering them in \`SceneManager.init\`.
- List images, audio and JSON to preload in the \`MANIFEST\` array of
  \`js/main.js\`; read them back with \`AssetLoader.get(key)\`.
- Persist data with \`SaveSystem.save(key, value)\`; high scores go through
  \`Scoreboard.submit(name, score)\`.

## Shipping updates

Bump \`CACHE_VERSION\` in \`service-worker.js\` whenever cached files change so
returning players get the new build. Old caches are removed on activation and
the runtime cache is trimmed to \`MAX_CACHE_SIZE\`.

## Icons

\`assets/icons/icon-192x192.png\` is a placeholder. Replace it with a real
192×192 icon (and add a 512×512 one to \`manifest.json\`) before publishing.

---

Generated by create-pwa-game v${ctx.generatorVersion}.
`;
}
