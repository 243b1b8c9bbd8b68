export function sceneManagerJs(): string {
  return `import { MenuScene } from './MenuScene.js';
import { GameScene } from './GameScene.js';

export class SceneManager {
    static scenes = {};
    static current = null;

    static init() {
        this.scenes = { MENU: new MenuScene(), GAME: new GameScene() };
        this.loadScene('MENU');
    }

    static loadScene(key) {
        const next = this.scenes[key];
        if (!next) throw new Error('Unknown scene: ' + key);
        if (this.current) this.current.exit();
        this.current = next;
        this.current.enter();
    }

    static update(dt) {
        if (this.current) this.current.update(dt);
    }

    static render(ctx) {
        if (this.current) this.current.render(ctx);
    }
}
`;
}

export function menuSceneJs(): string {
  return `import { DOMUtils } from '../utils/DOMUtils.js';
import { UIManager } from '../ui/UIManager.js';
import { AudioManager } from '../core/AudioManager.js';
import { Renderer } from '../core/Renderer.js';
import { Scoreboard } from '../state/Scoreboard.js';

export class MenuScene {
    enter() {
        DOMUtils.show('menu-scene');

        // Starting is the first user gesture, so it also unlocks audio
        DOMUtils.on('btn-start', () => {
            AudioManager.resume()
                .catch(err => console.warn('Audio unavailable:', err))
                .then(() => import('./SceneManager.js'))
                .then(m => m.SceneManager.loadScene('GAME'));
        });

        DOMUtils.on('btn-highscores', () => {
            Scoreboard.render(document.getElementById('score-rows'));
            UIManager.openModal('modal-highscores');
        });
        DOMUtils.on('btn-settings-menu', () => UIManager.openSidebar());
        DOMUtils.on('btn-about', () => UIManager.openModal('modal-about'));
        DOMUtils.on('btn-help', () => UIManager.openModal('modal-help'));

        DOMUtils.on('btn-close-scores', () => UIManager.closeModal());
        DOMUtils.on('btn-close-about', () => UIManager.closeModal());
        DOMUtils.on('btn-close-help', () => UIManager.closeModal());
    }

    update(dt) {}

    render(ctx) {
        Renderer.clear();
    }

    exit() {
        DOMUtils.hide('menu-scene');
        ['btn-start', 'btn-highscores', 'btn-settings-menu', 'btn-about', 'btn-help']
            .forEach(id => DOMUtils.off(id));
    }
}
`;
}

export function gameSceneJs(): string {
  return `import { DOMUtils } from '../utils/DOMUtils.js';
import { Renderer } from '../core/Renderer.js';
import { InputManager } from '../core/InputManager.js';
import { Store } from '../state/Store.js';

// Game logic goes here
export class GameScene {
    enter() {
        Store.session.score = 0;
        this.elapsed = 0;
        DOMUtils.show('game-hud');
    }

    update(dt) {
        this.elapsed += dt;
        if (InputManager.pointer.down) Store.session.score += 1;
    }

    render(ctx) {
        Renderer.clear();
        const { x, y, down } = InputManager.pointer;
        ctx.fillStyle = down ? '#e96714' : '#444444';
        ctx.beginPath();
        ctx.arc(x, y, 16 + Math.sin(this.elapsed * 4) * 4, 0, Math.PI * 2);
        ctx.fill();
    }

    exit() {
        DOMUtils.hide('game-hud');
    }
}
`;
}
