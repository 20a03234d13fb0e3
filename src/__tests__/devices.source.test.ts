import { describe, it, expect, vi, afterEach } from 'vitest';
import { DeviceListFile, parseDeviceList, sameEntries } from '../modules/devices/devices.source';
import { logger } from '../utils/logger';

const missingFile = () => Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });

describe('parseDeviceList', () => {
  it('una entrada por línea, sin espacios ni líneas vacías', () => {
    expect(parseDeviceList('10.0.0.1\r\n\n  core-sw-1  \n\t\n10.0.0.1\n')).toEqual(['10.0.0.1', 'core-sw-1', '10.0.0.1']);
  });

  it('un archivo vacío es una lista vacía', () => {
    expect(parseDeviceList('')).toEqual([]);
  });
});

describe('sameEntries', () => {
  it('compara contenido y orden', () => {
    expect(sameEntries(['a', 'b'], ['a', 'b'])).toBe(true);
    expect(sameEntries(['a', 'b'], ['b', 'a'])).toBe(false);
    expect(sameEntries(['a'], ['a', 'b'])).toBe(false);
  });
});

describe('DeviceListFile', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lee y parsea el archivo', async () => {
    const readText = vi.fn(async () => '10.0.0.1\ncore-sw-1\n');
    const source = new DeviceListFile('devices.txt', readText);

    expect(await source.read()).toEqual(['10.0.0.1', 'core-sw-1']);
    expect(readText).toHaveBeenCalledWith('devices.txt');
  });

  it('sin archivo devuelve una lista vacía y avisa una sola vez', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const info = vi.spyOn(logger, 'info');
    let contents: string | null = null;
    const source = new DeviceListFile('devices.txt', async () => {
      if (contents === null) throw missingFile();
      return contents;
    });

    expect(await source.read()).toEqual([]);
    expect(await source.read()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);

    contents = '10.0.0.1\n';
    expect(await source.read()).toEqual(['10.0.0.1']);
    expect(info).toHaveBeenCalledTimes(1);

    contents = null;
    expect(await source.read()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('otros errores de lectura también dan una lista vacía', async () => {
    const source = new DeviceListFile('devices.txt', async () => {
      throw new Error('EACCES: permission denied');
    });
    expect(await source.read()).toEqual([]);
  });
});
