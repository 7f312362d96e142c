import path from 'path';
import {
  isNumericCell,
  isNumericText,
  normalizeCell,
  splitFileName,
  toPosixPath,
  toTableName,
} from '../utils/normalizer';

describe('Normalizer', () => {
  describe('normalizeCell', () => {
    it('should turn numeric text into numbers', () => {
      expect(normalizeCell(' 12 ')).toBe(12);
      expect(normalizeCell('-0.5')).toBe(-0.5);
      expect(normalizeCell('1634567890.123')).toBe(1634567890.123);
    });

    it('should keep numeric text that a number would not print back', () => {
      expect(normalizeCell('1623456789123456789')).toBe('1623456789123456789');
      expect(normalizeCell('070')).toBe('070');
      expect(normalizeCell('1.50')).toBe('1.50');
      expect(normalizeCell('-.5')).toBe('-.5');
      expect(normalizeCell('1e3')).toBe('1e3');
    });

    it('should turn empty cells into null', () => {
      expect(normalizeCell('')).toBeNull();
      expect(normalizeCell('   ')).toBeNull();
    });

    it('should keep other text as written, trimmed', () => {
      expect(normalizeCell(' low ')).toBe('low');
      expect(normalizeCell('12abc')).toBe('12abc');
      expect(normalizeCell('0x1A')).toBe('0x1A');
      expect(normalizeCell('2021-03-04 10:00:00')).toBe('2021-03-04 10:00:00');
    });
  });

  describe('isNumericCell', () => {
    it('should accept numbers and numeric text', () => {
      expect(isNumericCell(7)).toBe(true);
      expect(isNumericCell('007')).toBe(true);
      expect(isNumericCell('t1')).toBe(false);
      expect(isNumericCell(null)).toBe(false);
    });
  });

  describe('isNumericText', () => {
    it('should recognise signed and exponent forms', () => {
      expect(isNumericText('+3.')).toBe(true);
      expect(isNumericText('2E-4')).toBe(true);
      expect(isNumericText('.')).toBe(false);
      expect(isNumericText('NaN')).toBe(false);
    });
  });

  describe('file names', () => {
    it('should lower-case the stem into a table name', () => {
      expect(toTableName(' EAR_ACC_Left ')).toBe('ear_acc_left');
    });

    it('should split stem and lower-case extension', () => {
      expect(splitFileName('Wrist_HR.CSV')).toEqual({ stem: 'Wrist_HR', extension: '.csv' });
      expect(splitFileName('muse.blinks.txt')).toEqual({ stem: 'muse.blinks', extension: '.txt' });
      expect(splitFileName('README')).toEqual({ stem: 'README', extension: '' });
    });

    it('should join relative paths with forward slashes', () => {
      expect(toPosixPath(path.join('participant_01', 'session_1', 'ear_acc_left.csv'))).toBe(
        'participant_01/session_1/ear_acc_left.csv'
      );
    });
  });
});
