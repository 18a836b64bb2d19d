import { describe, it, expect } from 'vitest';
import { detectLanguage, devanagariRatio } from '../../src/language.js';

describe('devanagariRatio', () => {
  it('is the share of characters in the Devanagari block', () => {
    expect(devanagariRatio('')).toBe(0);
    expect(devanagariRatio('wifi')).toBe(0);
    expect(devanagariRatio('नमस्ते')).toBe(1);
    expect(devanagariRatio('ab नम')).toBe(0.4);
  });
});

describe('detectLanguage', () => {
  it('defaults to English, including for blank text', () => {
    expect(detectLanguage('')).toBe('en');
    expect(detectLanguage('   ')).toBe('en');
    expect(detectLanguage('my printer is jammed')).toBe('en');
  });

  it('picks Nepali for mostly Devanagari text', () => {
    expect(detectLanguage('मेरो इन्टरनेट चल्दैन')).toBe('np');
  });

  it('picks Nepali when a common phrase appears in mixed text', () => {
    expect(detectLanguage('wifi इन्टरनेट issue on my office laptop again today')).toBe('np');
  });

  it('picks Nepali for a moderate Devanagari share in longer text', () => {
    expect(detectLanguage('my laptop is slow धेरै')).toBe('np');
  });

  it('keeps English for a moderate share in three words or fewer', () => {
    expect(detectLanguage('slow laptop धेरै')).toBe('en');
  });
});
