import { describe, it, expect } from 'vitest';
import { Commands, parseSensorLine } from '../core/decode/angleLine';

describe('Sensor line protocol', () => {
  it('should parse prefixed angle lines', () => {
    expect(parseSensorLine('ANG:12.5')).toEqual({ kind: 'angle', value: 12.5 });
    expect(parseSensorLine('ANG:-3')).toEqual({ kind: 'angle', value: -3 });
  });

  it('should parse bare numeric lines as angles', () => {
    expect(parseSensorLine('-7.25')).toEqual({ kind: 'angle', value: -7.25 });
    expect(parseSensorLine('.5')).toEqual({ kind: 'angle', value: 0.5 });
  });

  it('should parse battery lines', () => {
    expect(parseSensorLine('VBAT:3.71')).toEqual({ kind: 'battery', value: 3.71 });
  });

  it('should strip whitespace and carriage returns', () => {
    expect(parseSensorLine('  ANG:1e1 \r')).toEqual({ kind: 'angle', value: 10 });
  });

  it('should drop malformed lines', () => {
    expect(parseSensorLine('')).toBeNull();
    expect(parseSensorLine('   ')).toBeNull();
    expect(parseSensorLine('hello')).toBeNull();
    expect(parseSensorLine('ANG:abc')).toBeNull();
    expect(parseSensorLine('ANG:')).toBeNull();
    expect(parseSensorLine('VBAT:')).toBeNull();
    expect(parseSensorLine('VBAT:low')).toBeNull();
    expect(parseSensorLine('NaN')).toBeNull();
    expect(parseSensorLine('12.5.3')).toBeNull();
  });

  it('should encode the zero command as a single byte', () => {
    expect(Array.from(Commands.ZERO)).toEqual([0x7a]);
  });
});
