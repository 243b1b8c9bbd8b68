/**
 * Engine modules written to js/ and js/core/.
 */

export function mainJs(): string {
  return `import { Renderer } from './core/Renderer.js';
import { GameLoop } from './core/GameLoop.js';
import { AssetLoader } from './core/AssetLoader.js';
import { InputManager } from './core/InputManager.js';
import { SceneManager } from './scenes/SceneManager.js';
import { UIManager } from './ui/UIManager.js';
import { ErrorHandler } from './utils/ErrorHandler.js';

ErrorHandler.init();

// Assets preloaded before the first scene starts
const MANIFEST = [
    // { type: 'image', src: 'assets/textures/player.png', key: 'player' }
];

async function registerServiceWorker() {
    if (!('serviceWorker' in navigator)) return;
    try {
        await navigator.serviceWorker.register('./service-worker.js');
    } catch (err) {
        console.warn('Service worker registration failed:', err);
    }
}

async function boot() {
    try {
        Renderer.init('game-canvas');
        InputManager.init(Renderer.canvas);
        UIManager.init();
        await AssetLoader.load(MANIFEST);

        SceneManager.init();

        const loader = document.getElementById('loading-layer');
        loader.classList.add('fade-out');
        setTimeout(() => loader.remove(), 500);

        GameLoop.start(dt => {
            SceneManager.update(dt);
            SceneManager.render(Renderer.ctx);
        });
    } catch (err) {
        ErrorHandler.report(err);
    }

    registerServiceWorker();
}

window.addEventListener('DOMContentLoaded', boot);
`;
}

export function gameLoopJs(): string {
  return `// Frames longer than this are dropped instead of simulated
const MAX_FRAME_SECONDS = 0.1;

export class GameLoop {
    static callback = null;
    static lastTime = 0;
    static running = false;
    static frameId = 0;

    static start(callback) {
        this.callback = callback;
        this.running = true;
        this.lastTime = performance.now();

        // Pause while hidden to save battery; webkit prefix covers older Safari
        document.addEventListener('visibilitychange', () => this.onVisibilityChange(document.hidden));
        document.addEventListener('webkitvisibilitychange', () => this.onVisibilityChange(document.webkitHidden));

        this.frameId = requestAnimationFrame(time => this.tick(time));
    }

    static stop() {
        this.running = false;
        cancelAnimationFrame(this.frameId);
    }

    static onVisibilityChange(hidden) {
        if (hidden) {
            this.stop();
        } else if (!this.running && this.callback) {
            this.running = true;
            this.lastTime = performance.now();
            this.frameId = requestAnimationFrame(time => this.tick(time));
        }
    }

    static tick(time) {
        if (!this.running) return;

        const dt = (time - this.lastTime) / 1000;
        this.lastTime = time;

        if (dt < MAX_FRAME_SECONDS) {
            this.callback(dt);
        } else {
            console.warn('Skipped a ' + dt.toFixed(2) + 's frame');
        }

        this.frameId = requestAnimationFrame(next => this.tick(next));
    }
}
`;
}

export function rendererJs(): string {
  return `export class Renderer {
    static canvas = null;
    static ctx = null;
    static dpr = 1;

    static init(canvasId) {
        this.canvas = document.getElementById(canvasId);
        if (!this.canvas) throw new Error('Canvas #' + canvasId + ' not found');
        this.ctx = this.canvas.getContext('2d');
        this.resize();
        window.addEventListener('resize', () => this.resize());
    }

    // Backing store at device resolution, CSS size at window size
    static resize() {
        this.dpr = window.devicePixelRatio || 1;
        const width = window.innerWidth;
        const height = window.innerHeight;

        this.canvas.width = Math.floor(width * this.dpr);
        this.canvas.height = Math.floor(height * this.dpr);
        this.canvas.style.width = width + 'px';
        this.canvas.style.height = height + 'px';

        if (this.ctx) this.ctx.setTransform(this.dpr, 0, 0, this.dpr, 0, 0);
    }

    static clear(color = '#111111') {
        this.ctx.fillStyle = color;
        this.ctx.fillRect(0, 0, this.canvas.width / this.dpr, this.canvas.height / this.dpr);
    }
}
`;
}

export function inputManagerJs(): string {
  return `export class InputManager {
    static keys = new Set();
    static pointer = { x: 0, y: 0, down: false };

    static init(target) {
        window.addEventListener('keydown', e => this.keys.add(e.code));
        window.addEventListener('keyup', e => this.keys.delete(e.code));
        window.addEventListener('blur', () => this.keys.clear());

        target.addEventListener('pointerdown', e => this.onPointer(e, true));
        target.addEventListener('pointermove', e => this.onPointer(e, this.pointer.down));
        window.addEventListener('pointerup', e => this.onPointer(e, false));
    }

    static onPointer(e, down) {
        this.pointer.x = e.clientX;
        this.pointer.y = e.clientY;
        this.pointer.down = down;
    }

    static isDown(code) {
        return this.keys.has(code);
    }
}
`;
}

export function audioManagerJs(): string {
  return `export class AudioManager {
    static ctx = null;
    static master = null;
    static volume = 1;
    static enabled = true;

    static init() {
        const AudioContext = window.AudioContext || window.webkitAudioContext;
        this.ctx = new AudioContext();
        this.master = this.ctx.createGain();
        this.master.connect(this.ctx.destination);
        this.apply();
    }

    // Browsers keep audio suspended until a user gesture
    static async resume() {
        if (!this.ctx) this.init();
        if (this.ctx.state === 'suspended') await this.ctx.resume();
    }

    static setVolume(volume) {
        this.volume = Math.min(Math.max(volume, 0), 1);
        this.apply();
    }

    static toggleSound(enabled) {
        this.enabled = enabled;
        this.apply();
    }

    static apply() {
        if (this.master) this.master.gain.value = this.enabled ? this.volume : 0;
    }

    static play(buffer) {
        if (!this.ctx || !buffer) return;
        const source = this.ctx.createBufferSource();
        source.buffer = buffer;
        source.connect(this.master);
        source.start();
    }
}
`;
}

export function assetLoaderJs(): string {
  return `const CHUNK_SIZE = 5;
const MAX_RETRIES = 2;
const MAX_IMAGE_DIMENSION = 8192;

export class AssetLoader {
    static assets = {};
    static failedAssets = [];

    static async load(manifest, onProgress = null) {
        if (manifest.length === 0) return;

        let loaded = 0;
        // Chunked so mobile browsers are not flooded with parallel requests
        for (let i = 0; i < manifest.length; i += CHUNK_SIZE) {
            const chunk = manifest.slice(i, i + CHUNK_SIZE);
            await Promise.all(chunk.map(item => this.loadItem(item)));
            loaded += chunk.length;
            if (onProgress) onProgress(loaded / manifest.length);
        }

        if (this.failedAssets.length > 0) {
            console.warn(this.failedAssets.length + ' assets failed to load:', this.failedAssets);
        }
    }

    static async loadItem(item) {
        for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
            try {
                this.assets[item.key] = await this.loadOnce(item);
                return;
            } catch (err) {
                if (attempt < MAX_RETRIES) {
                    await new Promise(r => setTimeout(r, 1000 * (attempt + 1)));
                } else {
                    console.error('Giving up on ' + item.src + ':', err.message);
                    this.failedAssets.push(item.src);
                    this.assets[item.key] = item.type === 'image' ? this.createPlaceholder() : null;
                }
            }
        }
    }

    static loadOnce(item) {
        return new Promise((resolve, reject) => {
            if (item.type === 'image') {
                const img = new Image();
                img.onload = () => {
                    const { width, height } = img;
                    if (width < 1 || height < 1) {
                        reject(new Error('Invalid image dimensions: ' + item.src));
                    } else if (width > MAX_IMAGE_DIMENSION || height > MAX_IMAGE_DIMENSION) {
                        reject(new Error('Image exceeds ' + MAX_IMAGE_DIMENSION + 'px: ' + item.src));
                    } else {
                        resolve(img);
                    }
                };
                img.onerror = () => reject(new Error('Image load failed: ' + item.src));
                img.src = item.src;
            } else if (item.type === 'audio') {
                const audio = new Audio();
                audio.oncanplaythrough = () => resolve(audio);
                audio.onerror = () => reject(new Error('Audio load failed: ' + item.src));
                audio.src = item.src;
            } else if (item.type === 'json') {
                fetch(item.src)
                    .then(res => res.ok ? res.json() : Promise.reject(new Error('HTTP ' + res.status)))
                    .then(resolve, reject);
            } else {
                reject(new Error('Unknown asset type: ' + item.type));
            }
        });
    }

    static createPlaceholder() {
        const canvas = document.createElement('canvas');
        canvas.width = 1;
        canvas.height = 1;
        const img = new Image();
        img.src = canvas.toDataURL();
        return img;
    }

    static get(key) {
        return this.assets[key];
    }
}
`;
}
