export { encodeKey, decodeKey, DEFAULT_KEY_CODEC, IDENTITY_KEY_CODEC } from './key_codec';
export type { KeyCodec } from './key_codec';
