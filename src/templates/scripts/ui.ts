export function uiManagerJs(): string {
  return `import { Settings } from '../state/Settings.js';
import { DOMUtils } from '../utils/DOMUtils.js';

const FOCUSABLE = 'button, [href], input, select, textarea, [tabindex]:not([tabindex="-1"])';

export class UIManager {
    static activeModal = null;
    static returnFocus = null;
    static sidebar = null;
    static backdrop = null;

    static init() {
        this.sidebar = document.getElementById('settings-sidebar');
        this.backdrop = document.getElementById('sidebar-backdrop');

        DOMUtils.on('btn-sidebar-toggle', () => this.openSidebar());
        DOMUtils.on('btn-sidebar-close', () => this.closeSidebar());
        this.backdrop.onclick = () => this.closeSidebar();

        DOMUtils.on('btn-return-menu', () => {
            this.closeSidebar();
            import('../scenes/SceneManager.js').then(m => m.SceneManager.loadScene('MENU'));
        });

        document.getElementById('sel-sidebar-side')
            .addEventListener('change', e => Settings.setSidebarSide(e.target.value));
        document.getElementById('rng-volume')
            .addEventListener('input', e => Settings.setVolume(e.target.value));
        document.getElementById('chk-sound')
            .addEventListener('change', e => Settings.toggleSound(e.target.checked));

        document.addEventListener('keydown', e => this.onKeyDown(e));

        Settings.load();
    }

    static onKeyDown(e) {
        if (e.key === 'Escape') {
            if (this.activeModal) this.closeModal();
            else if (this.sidebar.classList.contains('active')) this.closeSidebar();
        }
        if (e.key === 'Tab' && this.activeModal) this.trapFocus(e, this.activeModal);
    }

    static trapFocus(e, container) {
        const focusable = container.querySelectorAll(FOCUSABLE);
        if (focusable.length === 0) return;
        const first = focusable[0];
        const last = focusable[focusable.length - 1];

        if (e.shiftKey && document.activeElement === first) {
            last.focus();
            e.preventDefault();
        } else if (!e.shiftKey && document.activeElement === last) {
            first.focus();
            e.preventDefault();
        }
    }

    static openModal(id) {
        const modal = document.getElementById(id);
        if (!modal) return;
        this.returnFocus = document.activeElement;
        modal.classList.remove('hidden');
        this.activeModal = modal;
        const focusable = modal.querySelectorAll(FOCUSABLE);
        if (focusable.length > 0) focusable[0].focus();
    }

    static closeModal() {
        if (!this.activeModal) return;
        this.activeModal.classList.add('hidden');
        this.activeModal = null;
        if (this.returnFocus) this.returnFocus.focus();
    }

    static openSidebar() {
        this.sidebar.classList.add('active');
        this.backdrop.classList.add('active');
        const focusable = this.sidebar.querySelectorAll(FOCUSABLE);
        if (focusable.length > 0) focusable[0].focus();
    }

    static closeSidebar() {
        this.sidebar.classList.remove('active');
        this.backdrop.classList.remove('active');
    }

    static setSidebarSide(side) {
        this.sidebar.classList.remove('left', 'right');
        this.sidebar.classList.add(side);
    }

    static updateSettingsUI(settings) {
        document.getElementById('sel-sidebar-side').value = settings.sidebarSide;
        document.getElementById('rng-volume').value = settings.volume;
        document.getElementById('chk-sound').checked = settings.soundEnabled;
    }
}
`;
}

export function errorDisplayJs(): string {
  return `const TOAST_MS = 5000;

export class ErrorDisplay {
    static timer = 0;

    static show(message) {
        let toast = document.getElementById('error-toaster');
        if (!toast) {
            toast = document.createElement('div');
            toast.id = 'error-toaster';
            toast.setAttribute('role', 'alert');
            document.body.appendChild(toast);
        }
        toast.textContent = 'Error: ' + message;
        toast.style.display = 'block';

        clearTimeout(this.timer);
        this.timer = setTimeout(() => { toast.style.display = 'none'; }, TOAST_MS);
    }
}
`;
}
