import { sniffMimeType } from './file-signature';

describe('sniffMimeType', () => {
  it.each([
    ['image/png', [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]],
    ['image/jpeg', [0xff, 0xd8, 0xff, 0xe0, 0x00]],
    ['image/gif', [...Buffer.from('GIF89a'), 0x01]],
    ['image/webp', [...Buffer.from('RIFF'), 0, 0, 0, 0, ...Buffer.from('WEBPVP8 ')]],
    ['application/pdf', [...Buffer.from('%PDF-1.7\n')]],
  ])('detects %s', (expected, bytes) => {
    expect(sniffMimeType(Buffer.from(bytes))).toBe(expected);
  });

  it('returns null for plain text', () => {
    expect(sniffMimeType(Buffer.from('hello world'))).toBeNull();
  });

  it('returns null for a truncated header', () => {
    expect(sniffMimeType(Buffer.from([0x89, 0x50]))).toBeNull();
  });

  it('does not mistake a RIFF audio file for WebP', () => {
    expect(
      sniffMimeType(Buffer.from([...Buffer.from('RIFF'), 0, 0, 0, 0, ...Buffer.from('WAVE')])),
    ).toBeNull();
  });
});
