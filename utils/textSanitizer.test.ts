/**
 * Text Sanitizer Tests
 */

import { sanitizeFileBase, splitFileName, truncateForLog } from './textSanitizer';

describe('textSanitizer', () => {
  describe('splitFileName', () => {
    it('should split base and last extension', () => {
      expect(splitFileName('My Trip.final.mp4')).toEqual({ base: 'My Trip.final', extension: '.mp4' });
    });

    it('should return empty extension when there is none', () => {
      expect(splitFileName('recording')).toEqual({ base: 'recording', extension: '' });
    });

    it('should keep dotfiles whole', () => {
      expect(splitFileName('.hidden')).toEqual({ base: '.hidden', extension: '' });
    });

    it('should not treat a trailing dot as an extension', () => {
      expect(splitFileName('clip.')).toEqual({ base: 'clip.', extension: '' });
    });

    it('should only look at the last path component', () => {
      expect(splitFileName('folder/sub/clip.mov')).toEqual({ base: 'clip', extension: '.mov' });
    });
  });

  describe('sanitizeFileBase', () => {
    it('should keep letters, digits, underscores and dashes', () => {
      expect(sanitizeFileBase('abc_DEF-123')).toBe('abc_DEF-123');
    });

    it('should replace every other character with an underscore', () => {
      expect(sanitizeFileBase('My Trip (2023).final')).toBe('My_Trip__2023__final');
    });

    it('should replace one underscore per non-ASCII character', () => {
      expect(sanitizeFileBase('café 🎬')).toBe('caf___');
    });

    it('should cap the length at 50 by default', () => {
      expect(sanitizeFileBase('a'.repeat(80))).toBe('a'.repeat(50));
    });

    it('should honour a custom length', () => {
      expect(sanitizeFileBase('abcdef', 3)).toBe('abc');
    });

    it('should return empty string for empty input', () => {
      expect(sanitizeFileBase('')).toBe('');
    });
  });

  describe('truncateForLog', () => {
    it('should leave short text alone', () => {
      expect(truncateForLog('short', 10)).toBe('short');
    });

    it('should cut long text and add an ellipsis', () => {
      expect(truncateForLog('abcdefghij', 4)).toBe('abcd...');
    });
  });
});
