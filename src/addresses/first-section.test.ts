import { describe, it, expect } from 'vitest';
import { extractFirstSection } from './first-section.js';

describe('extractFirstSection', () => {
  it('should keep words longer than two characters of the first part', () => {
    expect(extractFirstSection('123 Main St, Springfield')).toBe('123 main');
  });

  it('should merge a short first part with the second', () => {
    expect(
      extractFirstSection(
        '31, Street 103, Tall Al Zaatar, Dekwaneh, Matn District, Mount Lebanon Governorate, 2703, Lebanon'
      )
    ).toBe('street 103');
  });

  it('should skip leading commas', () => {
    expect(extractFirstSection(', , Foo Bar Road, City')).toBe('foo bar road');
  });

  it('should drop symbols before splitting', () => {
    expect(extractFirstSection('£ Market Hall, Town')).toBe('market hall');
  });

  it('should count code points, not UTF-16 units', () => {
    expect(extractFirstSection('东京塔, Tokyo')).toBe('东京塔 tokyo');
  });

  it('should return an empty string when nothing survives', () => {
    expect(extractFirstSection('')).toBe('');
    expect(extractFirstSection('  ')).toBe('');
    expect(extractFirstSection('Ab')).toBe('');
    expect(extractFirstSection(',,,')).toBe('');
  });
});
