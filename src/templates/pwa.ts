/**
 * Service worker and web-app manifest. Both carry the canonical name so cache
 * keys and install metadata stay filesystem- and URL-safe.
 */

import type { TemplateContext } from './types.js';

const PRECACHED_EXTENSIONS = ['.html', '.json', '.css', '.js'];

/**
 * Everything the page loads on first paint, including every ES module that
 * `js/main.js` pulls in. The worker script itself is never cached.
 */
export function precacheList(paths: Iterable<string>): string[] {
  const urls = ['./'];
  for (const path of paths) {
    if (path === 'service-worker.js') continue;
    if (PRECACHED_EXTENSIONS.some(ext => path.endsWith(ext))) {
      urls.push(`./${path}`);
    }
  }
  return urls;
}

export function serviceWorker(ctx: TemplateContext): string {
  const prefix = `${ctx.canonicalName}-v`;
  const shell = ctx.precache.map(path => `    '${path}'`).join(',\n');

  return `const CACHE_VERSION = 1;
const CACHE_PREFIX = '${prefix}';
const CACHE_NAME = CACHE_PREFIX + CACHE_VERSION;
const MAX_CACHE_SIZE = 50 * 1024 * 1024; // 50MB
const ASSETS = [
${shell}
];

// Evict oldest entries until the cache fits under MAX_CACHE_SIZE
async function limitCacheSize(cacheName, maxBytes) {
    const cache = await caches.open(cacheName);
    const requests = await cache.keys();
    let total = 0;
    const sizes = [];

    for (const request of requests) {
        const response = await cache.match(request);
        const size = response ? (await response.clone().blob()).size : 0;
        sizes.push({ request, size });
        total += size;
    }

    while (total > maxBytes && sizes.length > 0) {
        const oldest = sizes.shift();
        await cache.delete(oldest.request);
        total -= oldest.size;
    }
}

self.addEventListener('install', event => {
    console.log('[SW] Installing ' + CACHE_NAME);
    event.waitUntil(
        caches.open(CACHE_NAME)
            .then(cache => cache.addAll(ASSETS))
            .then(() => self.skipWaiting())
    );
});

self.addEventListener('activate', event => {
    console.log('[SW] Activating ' + CACHE_NAME);
    event.waitUntil(
        caches.keys()
            .then(names => Promise.all(
                names
                    .filter(name => name.startsWith(CACHE_PREFIX) && name !== CACHE_NAME)
                    .map(name => {
                        console.log('[SW] Deleting old cache: ' + name);
                        return caches.delete(name);
                    })
            ))
            .then(() => self.clients.claim())
    );
});

self.addEventListener('fetch', event => {
    if (event.request.method !== 'GET') return;

    event.respondWith(
        caches.match(event.request)
            .then(cached => {
                if (cached) return cached;

                return fetch(event.request).then(response => {
                    if (!response || response.status !== 200 || response.type === 'error') {
                        return response;
                    }
                    const copy = response.clone();
                    caches.open(CACHE_NAME)
                        .then(cache => cache.put(event.request, copy))
                        .then(() => limitCacheSize(CACHE_NAME, MAX_CACHE_SIZE));
                    return response;
                });
            })
            .catch(() => caches.match('./index.html'))
    );
});

self.addEventListener('message', event => {
    if (event.data === 'SKIP_WAITING') self.skipWaiting();
});
`;
}

export interface WebAppManifest {
  name: string;
  short_name: string;
  description: string;
  start_url: string;
  scope: string;
  display: 'standalone' | 'fullscreen' | 'minimal-ui' | 'browser';
  orientation: string;
  background_color: string;
  theme_color: string;
  icons: Array<{ src: string; sizes: string; type: string; purpose?: string }>;
}

export function webManifest(ctx: TemplateContext): string {
  const manifest: WebAppManifest = {
    name: ctx.canonicalName,
    short_name: ctx.canonicalName,
    description: `PWA game generated by create-pwa-game v${ctx.generatorVersion}`,
    start_url: '.',
    scope: '.',
    display: 'standalone',
    orientation: 'landscape',
    background_color: '#111111',
    theme_color: '#e96714',
    icons: [
      { src: 'assets/icons/icon-192x192.png', sizes: '192x192', type: 'image/png', purpose: 'any' },
    ],
  };
  return JSON.stringify(manifest, null, 2) + '\n';
}
