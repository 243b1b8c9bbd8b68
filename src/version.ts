export const NAME = 'create-pwa-game';
export const VERSION = '1.0.0';
