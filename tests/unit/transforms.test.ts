import { describe, it, expect } from 'vitest';
import {
  cleanValue,
  collapseWhitespace,
  parseKeyValueLines,
  stripPrefix,
  toSnakeCase,
} from '../../src/extract/transforms.js';

describe('collapseWhitespace', () => {
  it('trims and collapses runs of whitespace', () => {
    expect(collapseWhitespace('  Green \n\t Acres  ')).toBe('Green Acres');
  });
});

describe('toSnakeCase', () => {
  it('lowercases and joins words with underscores', () => {
    expect(toSnakeCase('Project Type')).toBe('project_type');
    expect(toSnakeCase(' GST No. ')).toBe('gst_no');
  });
});

describe('cleanValue', () => {
  it('strips a prefix case-insensitively', () => {
    expect(cleanValue('By   Acme Builders', { stripPrefix: 'by ' })).toBe('Acme Builders');
  });

  it('leaves values without the prefix alone', () => {
    expect(cleanValue('Acme Builders', { stripPrefix: 'by ' })).toBe('Acme Builders');
  });

  it('cuts the prefix from the same characters it compared', () => {
    // U+0130 lowercases to two code units, so a lowercased copy would be one longer
    expect(stripPrefix('\u0130stanbul Homes', 'i\u0307')).toBe('\u0130stanbul Homes');
    expect(stripPrefix('BY \u0130stanbul Homes', 'by ')).toBe('\u0130stanbul Homes');
  });

  it('keeps the first capture group of a pattern', () => {
    expect(cleanValue('RERA No: PRM/KA/1251', { pattern: 'No:\\s*(\\S+)' })).toBe('PRM/KA/1251');
  });

  it('keeps the whole match when the pattern has no group', () => {
    expect(cleanValue('Reg PRM/KA/1251 (valid)', { pattern: 'PRM/\\S+' })).toBe('PRM/KA/1251');
  });

  it('empties a value the pattern does not match', () => {
    expect(cleanValue('pending', { pattern: '\\d+' })).toBe('');
  });

  it('falls back to the default when nothing is left', () => {
    expect(cleanValue(null, { default: 'Unknown' })).toBe('Unknown');
    expect(cleanValue('pending', { pattern: '\\d+', default: 'n/a' })).toBe('n/a');
  });
});

describe('parseKeyValueLines', () => {
  it('keeps lines with a single colon and both sides filled', () => {
    const text = [
      'Name: Acme Ltd',
      'GSTIN:   29ABCDE1234F1Z5',
      'No colon here',
      'Website: https://acme.example.test',
      ': orphan value',
      'Empty:   ',
    ].join('\n');

    expect(parseKeyValueLines(text, 'promoter_')).toEqual({
      promoter_name: 'Acme Ltd',
      promoter_gstin: '29ABCDE1234F1Z5',
    });
  });

  it('accepts CRLF line endings', () => {
    expect(parseKeyValueLines('Office Phone: 080 1234\r\nCity: Mysuru')).toEqual({
      office_phone: '080 1234',
      city: 'Mysuru',
    });
  });
});
