import { describe, it, expect } from 'vitest';
import { ConfigError, expandCredentials, parseCredentials, parsePositiveInt } from '../config/env';

describe('parseCredentials', () => {
  it('parsea usuarios con una o varias claves, en orden', () => {
    expect(parseCredentials('admin:first|second, ops:third')).toEqual([
      { username: 'admin', passwords: ['first', 'second'] },
      { username: 'ops',   passwords: ['third'] },
    ]);
  });

  it('solo el primer ":" separa usuario de clave', () => {
    expect(parseCredentials('admin:pa:ss')).toEqual([{ username: 'admin', passwords: ['pa:ss'] }]);
  });

  it('una cadena vacía no tiene credenciales', () => {
    expect(parseCredentials('')).toEqual([]);
    expect(parseCredentials(' , ')).toEqual([]);
  });

  it('rechaza entradas sin usuario o sin clave', () => {
    expect(() => parseCredentials('solo-usuario')).toThrow(ConfigError);
    expect(() => parseCredentials(':test-secret')).toThrow(ConfigError);
    expect(() => parseCredentials('admin:')).toThrow('La credencial SSH de "admin" no tiene claves');
  });
});

describe('expandCredentials', () => {
  it('aplana a pares usuario/clave respetando el orden', () => {
    const sets = parseCredentials('admin:first|second,ops:third');
    expect(expandCredentials(sets)).toEqual([
      { username: 'admin', password: 'first' },
      { username: 'admin', password: 'second' },
      { username: 'ops',   password: 'third' },
    ]);
  });
});

describe('parsePositiveInt', () => {
  it('usa el default cuando la variable no está o está vacía', () => {
    expect(parsePositiveInt('PROBE_TIMEOUT_MS', undefined, 1000)).toBe(1000);
    expect(parsePositiveInt('PROBE_TIMEOUT_MS', '  ', 1000)).toBe(1000);
  });

  it('acepta enteros positivos', () => {
    expect(parsePositiveInt('PROBE_TIMEOUT_MS', ' 250 ', 1000)).toBe(250);
  });

  it('rechaza valores no numéricos, cero o negativos', () => {
    expect(() => parsePositiveInt('PROBE_TIMEOUT_MS', 'abc', 1000)).toThrow(ConfigError);
    expect(() => parsePositiveInt('PROBE_TIMEOUT_MS', '0', 1000)).toThrow(ConfigError);
    expect(() => parsePositiveInt('PROBE_TIMEOUT_MS', '-5', 1000)).toThrow(ConfigError);
    expect(() => parsePositiveInt('PROBE_TIMEOUT_MS', '1.5', 1000)).toThrow(
      'Valor inválido para PROBE_TIMEOUT_MS: "1.5" (se espera un entero positivo)',
    );
  });
});
