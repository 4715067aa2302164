import { ByteReader, ByteWriter, IsWide, PasswordVerifier, UnicodeStringSize } from '../src';

describe('bytes', () => {

  test('writer grows and reader reads back little-endian', () => {
    const writer = new ByteWriter(4);
    writer.WriteUInt16(0x1234);
    writer.WriteInt32(-2);
    writer.WriteDouble(3.25);
    writer.WriteChars('ab', true);
    const bytes = writer.Bytes();
    expect(bytes.length).toBe(18);
    expect(bytes[0]).toBe(0x34);

    const reader = new ByteReader(bytes);
    expect(reader.ReadUInt16()).toBe(0x1234);
    expect(reader.ReadInt32()).toBe(-2);
    expect(reader.ReadDouble()).toBe(3.25);
    expect(reader.ReadChars(2, true)).toBe('ab');
    expect(reader.remaining).toBe(0);
  });

  test('reading past the end throws', () => {
    const reader = new ByteReader(new Uint8Array(3));
    expect(() => reader.ReadUInt32()).toThrow(RangeError);
  });

});

describe('strings', () => {

  test('compressed unless a character needs two bytes', () => {
    expect(IsWide('café')).toBe(false);
    expect(IsWide('中')).toBe(true);
    expect(UnicodeStringSize('abc')).toBe(6);
    expect(UnicodeStringSize('中文')).toBe(7);
  });

});

describe('password verifier', () => {

  test('known value', () => {
    expect(PasswordVerifier('abcdefghij')).toBe(0xfef1);
  });

  test('empty password', () => {
    expect(PasswordVerifier('')).toBe(0);
  });

});
