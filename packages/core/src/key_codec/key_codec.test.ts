import { decodeKey, encodeKey, DEFAULT_KEY_CODEC, IDENTITY_KEY_CODEC } from './key_codec';

describe('KeyCodec', () => {
  describe('encodeKey', () => {
    it('should escape slash, percent and NUL with uppercase hex', () => {
      expect(encodeKey('a/b%')).toBe('a%2Fb%25');
      expect(encodeKey('x\u0000y')).toBe('x%00y');
    });

    it('should leave every other character untouched', () => {
      expect(encodeKey('hello world.toml')).toBe('hello world.toml');
      expect(encodeKey('café:日本')).toBe('café:日本');
      expect(encodeKey('back\\slash')).toBe('back\\slash');
    });

    it('should return the empty string for the empty key', () => {
      expect(encodeKey('')).toBe('');
    });
  });

  describe('decodeKey', () => {
    it('should decode valid escapes', () => {
      expect(decodeKey('a%2Fb')).toBe('a/b');
      expect(decodeKey('100%25')).toBe('100%');
      expect(decodeKey('%00')).toBe('\u0000');
    });

    it('should accept lowercase hex digits', () => {
      expect(decodeKey('a%2fb')).toBe('a/b');
    });

    it('should pass malformed escapes through unchanged', () => {
      expect(decodeKey('%zz')).toBe('%zz');
      expect(decodeKey('%')).toBe('%');
      expect(decodeKey('%2')).toBe('%2');
      expect(decodeKey('100%')).toBe('100%');
      expect(decodeKey('a%g1b')).toBe('a%g1b');
    });

    it('should keep decoding after a malformed escape', () => {
      expect(decodeKey('%%41')).toBe('%A');
      expect(decodeKey('%zz%2F')).toBe('%zz/');
    });

    it('should decode runs of non-ASCII escapes as UTF-8', () => {
      expect(decodeKey('caf%C3%A9')).toBe('café');
      expect(decodeKey('%e6%97%a5%E6%9C%AC.toml')).toBe('日本.toml');
      expect(decodeKey('%F0%9F%98%80')).toBe('\u{1F600}');
      expect(decodeKey('%C3%A9%2F%C3%A9')).toBe('é/é');
    });

    it('should copy invalid UTF-8 runs through unchanged', () => {
      expect(decodeKey('%C3')).toBe('%C3');
      expect(decodeKey('%C3%28')).toBe('%C3(');
      expect(decodeKey('a%FFb')).toBe('a%FFb');
      expect(decodeKey('%A9%C3')).toBe('%A9%C3');
    });

    it('should tolerate strings that were never encoded', () => {
      expect(decodeKey('plain-name')).toBe('plain-name');
      expect(decodeKey('')).toBe('');
    });
  });

  describe('round trip', () => {
    const samples = [
      '',
      'simple',
      'a/b%',
      '/leading/and/trailing/',
      '%%%',
      '%2F literally',
      'nul\u0000inside\u0000',
      'unicode éè \u{1F600}',
      'lone surrogate \ud800',
      'foo.toml',
    ];

    it.each(samples)('should restore %j', (sample) => {
      expect(decodeKey(encodeKey(sample))).toBe(sample);
    });

    it('should never produce a slash or NUL in the encoded form', () => {
      for (const sample of samples) {
        const encoded = encodeKey(sample);
        expect(encoded).not.toContain('/');
        expect(encoded).not.toContain('\u0000');
      }
    });
  });

  describe('codec objects', () => {
    it('DEFAULT_KEY_CODEC should use the escaping functions', () => {
      expect(DEFAULT_KEY_CODEC.encode('a/b')).toBe('a%2Fb');
      expect(DEFAULT_KEY_CODEC.decode('a%2Fb')).toBe('a/b');
    });

    it('IDENTITY_KEY_CODEC should not transform names', () => {
      expect(IDENTITY_KEY_CODEC.encode('a/b%')).toBe('a/b%');
      expect(IDENTITY_KEY_CODEC.decode('a%2Fb')).toBe('a%2Fb');
    });
  });
});
