// 1×1 transparent PNG standing in for the app icon until the user supplies one
const PLACEHOLDER_ICON_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

export function placeholderIcon(): Uint8Array {
  return new Uint8Array(Buffer.from(PLACEHOLDER_ICON_BASE64, 'base64'));
}
