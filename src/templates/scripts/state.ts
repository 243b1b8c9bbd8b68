export function storeJs(): string {
  return `export const Store = {
    settings: {
        volume: 1.0,
        soundEnabled: true,
        sidebarSide: 'right'
    },
    session: {
        score: 0
    }
};
`;
}

export function saveSystemJs(): string {
  return `const PREFIX = 'game:';

// localStorage can throw in private mode or when the quota is full
export class SaveSystem {
    static save(key, data) {
        try {
            localStorage.setItem(PREFIX + key, JSON.stringify(data));
            return true;
        } catch (err) {
            console.warn('Save failed for ' + key + ':', err);
            return false;
        }
    }

    static load(key, fallback = null) {
        try {
            const raw = localStorage.getItem(PREFIX + key);
            return raw === null ? fallback : JSON.parse(raw);
        } catch (err) {
            console.warn('Corrupt save data for ' + key + ', resetting');
            localStorage.removeItem(PREFIX + key);
            return fallback;
        }
    }

    static remove(key) {
        localStorage.removeItem(PREFIX + key);
    }
}
`;
}

export function settingsJs(): string {
  return `import { SaveSystem } from './SaveSystem.js';
import { Store } from './Store.js';
import { UIManager } from '../ui/UIManager.js';
import { AudioManager } from '../core/AudioManager.js';

const SETTINGS_KEY = 'settings';

export class Settings {
    static load() {
        const saved = SaveSystem.load(SETTINGS_KEY);
        if (saved) Store.settings = { ...Store.settings, ...saved };

        AudioManager.setVolume(Store.settings.volume);
        AudioManager.toggleSound(Store.settings.soundEnabled);
        UIManager.updateSettingsUI(Store.settings);
        UIManager.setSidebarSide(Store.settings.sidebarSide);
    }

    static save() {
        SaveSystem.save(SETTINGS_KEY, Store.settings);
    }

    static setVolume(value) {
        Store.settings.volume = parseFloat(value);
        AudioManager.setVolume(Store.settings.volume);
        this.save();
    }

    static toggleSound(enabled) {
        Store.settings.soundEnabled = enabled;
        AudioManager.toggleSound(enabled);
        this.save();
    }

    static setSidebarSide(side) {
        Store.settings.sidebarSide = side === 'left' ? 'left' : 'right';
        UIManager.setSidebarSide(Store.settings.sidebarSide);
        this.save();
    }
}
`;
}

export function scoreboardJs(): string {
  return `import { SaveSystem } from './SaveSystem.js';

const SCORES_KEY = 'highscores';
const MAX_ENTRIES = 10;

export class Scoreboard {
    static all() {
        return SaveSystem.load(SCORES_KEY, []);
    }

    static submit(name, score) {
        const entries = this.all();
        entries.push({ name: String(name).slice(0, 12), score: Math.floor(score) });
        entries.sort((a, b) => b.score - a.score);
        SaveSystem.save(SCORES_KEY, entries.slice(0, MAX_ENTRIES));
    }

    // textContent only: names are user input
    static render(tbody) {
        tbody.replaceChildren();
        const entries = this.all();
        if (entries.length === 0) {
            const row = tbody.insertRow();
            row.insertCell().textContent = 'No scores yet';
            return;
        }
        entries.forEach((entry, i) => {
            const row = tbody.insertRow();
            row.insertCell().textContent = (i + 1) + '. ' + entry.name;
            row.insertCell().textContent = entry.score.toLocaleString();
        });
    }
}
`;
}
