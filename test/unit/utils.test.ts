import { describe, it, expect } from 'vitest';
import { Logger, createLogger, formatLogEntry, type LogEntry } from '../../src/utils/Logger.js';
import { numberToWords } from '../../src/utils/numberToWords.js';
import { pickRandom, randomIndex } from '../../src/utils/random.js';
import { ImageDecoder, isImagePath } from '../../src/utils/ImageDecoder.js';
import { PPTGenError, SlidesmithError, errorMessage } from '../../src/utils/errors.js';

describe('Logger', () => {
  it('should drop entries below its level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('warn', 'root', (entry) => entries.push(entry));
    logger.info('hidden');
    logger.warn('shown', { slide: 3 });
    logger.error('also shown');
    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['warn', 'shown'],
      ['error', 'also shown'],
    ]);
    expect(entries[0].data).toEqual({ slide: 3 });
  });

  it('should chain child contexts and share the sink', () => {
    const entries: LogEntry[] = [];
    const logger = new Logger('debug', 'PPTGen', (entry) => entries.push(entry));
    logger.child('CatalogPage').child('items').debug('paired');
    expect(entries[0].context).toBe('PPTGen:CatalogPage:items');
  });

  it('should log nothing when silent', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('silent', undefined, (entry) => entries.push(entry));
    logger.error('dropped');
    expect(entries).toEqual([]);
  });

  it('should format level, context and message', () => {
    const line = formatLogEntry({
      level: 'info',
      message: 'Saved deck',
      context: 'slidesmith',
      timestamp: new Date('2024-01-02T03:04:05.000Z'),
    });
    expect(line).toBe('[2024-01-02T03:04:05.000Z] [INFO] [slidesmith] Saved deck');
  });
});

describe('numberToWords', () => {
  it('should spell out small numbers', () => {
    expect(numberToWords(0)).toBe('zero');
    expect(numberToWords(7)).toBe('seven');
    expect(numberToWords(13)).toBe('thirteen');
    expect(numberToWords(40)).toBe('forty');
    expect(numberToWords(21)).toBe('twenty-one');
  });

  it('should spell out hundreds and thousands', () => {
    expect(numberToWords(100)).toBe('one hundred');
    expect(numberToWords(342)).toBe('three hundred and forty-two');
    expect(numberToWords(2000)).toBe('two thousand');
  });

  it('should reject values it cannot spell', () => {
    expect(() => numberToWords(-1)).toThrow(RangeError);
    expect(() => numberToWords(1.5)).toThrow(RangeError);
  });
});

describe('random helpers', () => {
  it('should map the unit interval onto indices', () => {
    expect(randomIndex(4, () => 0)).toBe(0);
    expect(randomIndex(4, () => 0.5)).toBe(2);
    expect(randomIndex(4, () => 0.9999)).toBe(3);
  });

  it('should pick nothing from an empty list', () => {
    expect(pickRandom([], () => 0.3)).toBeUndefined();
    expect(pickRandom(['a', 'b', 'c'], () => 0.4)).toBe('b');
  });
});

describe('errors', () => {
  it('should carry a code and details', () => {
    const error = new PPTGenError('bad style', { style: 'wave' });
    expect(error).toBeInstanceOf(SlidesmithError);
    expect(error.code).toBe('GENERATION_ERROR');
    expect(error.details).toEqual({ style: 'wave' });
    expect(error.name).toBe('PPTGenError');
  });

  it('should read messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('ImageDecoder', () => {
  const decoder = new ImageDecoder({ logger: createLogger('silent') });

  it('should recognize image file names', () => {
    expect(isImagePath('components/picture/hero_3.png')).toBe(true);
    expect(isImagePath('photo.JPG')).toBe(true);
    expect(isImagePath('components/picture')).toBe(false);
  });

  it('should detect formats by their leading bytes', () => {
    expect(decoder.detectFormat(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d]))).toBe('png');
    expect(decoder.detectFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
    expect(decoder.detectFormat(Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ', 'latin1'))).toBe('webp');
    expect(decoder.detectFormat(Buffer.from('RIFF\x00\x00\x00\x00WAVEfmt ', 'latin1'))).toBe('unknown');
    expect(decoder.detectFormat(Buffer.from([0x42]))).toBe('unknown');
  });

  it('should name media parts by format', () => {
    expect(decoder.getExtension('jpeg')).toBe('jpeg');
    expect(decoder.getMimeType('tiff')).toBe('image/tiff');
    expect(decoder.getExtension('unknown')).toBe('bin');
  });

  it('should pass PNG data through', async () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    expect(await decoder.toPng(png)).toBe(png);
  });
});
