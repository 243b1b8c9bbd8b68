export function mathUtilsJs(): string {
  return `export const MathUtils = {
    clamp: (value, min, max) => Math.min(Math.max(value, min), max),
    lerp: (start, end, t) => start + (end - start) * t,
    randomRange: (min, max) => min + Math.random() * (max - min),
    randomInt: (min, max) => Math.floor(min + Math.random() * (max - min + 1)),
    distance: (x1, y1, x2, y2) => Math.hypot(x2 - x1, y2 - y1),
    degToRad: deg => deg * Math.PI / 180
};
`;
}

export function domUtilsJs(): string {
  return `export class DOMUtils {
    static show(id) {
        const el = document.getElementById(id);
        if (el) el.classList.remove('hidden');
    }

    static hide(id) {
        const el = document.getElementById(id);
        if (el) el.classList.add('hidden');
    }

    static on(id, handler) {
        const el = document.getElementById(id);
        if (el) el.onclick = handler;
    }

    static off(id) {
        const el = document.getElementById(id);
        if (el) el.onclick = null;
    }
}
`;
}

export function errorHandlerJs(): string {
  return `import { ErrorDisplay } from '../ui/ErrorDisplay.js';

export class ErrorHandler {
    static init() {
        window.addEventListener('error', e => {
            const target = e.target;
            // Resource failures arrive on the capture phase with an element target
            if (target && target !== window && target.tagName) {
                if (target.tagName === 'IMG') {
                    console.warn('Image failed to load:', target.src);
                    target.style.display = 'none';
                } else if (target.tagName === 'SCRIPT') {
                    ErrorDisplay.show('Failed to load a required script');
                }
                return;
            }
            this.report(e.error || e.message);
        }, true);

        window.addEventListener('unhandledrejection', e => {
            this.report(e.reason);
        });
    }

    static report(err) {
        console.error(err);
        const message = err && err.message ? err.message : String(err);
        ErrorDisplay.show(message);
    }
}
`;
}
