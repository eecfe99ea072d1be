import { describe, it, expect } from 'vitest';
import { classifyConfidence, overallConfidence } from './confidence.js';

describe('classifyConfidence', () => {
  it('should return HIGH for many tightly clustered tracked points', () => {
    expect(classifyConfidence(6, 1, 10, 'tracked')).toBe('HIGH');
  });

  it('should return MEDIUM for too few tracked points', () => {
    expect(classifyConfidence(3, 1, 10, 'tracked')).toBe('MEDIUM');
  });

  it('should return LOW for a single tracked point', () => {
    expect(classifyConfidence(1, 0, 10, 'tracked')).toBe('LOW');
  });

  it('should return LOW for seed coverage regardless of count', () => {
    expect(classifyConfidence(6, 0, 10, 'seed')).toBe('LOW');
  });

  it('should return MEDIUM when dispersion reaches the gate', () => {
    // 2 is exactly 0.2 x 10, and the gate is strict
    expect(classifyConfidence(6, 2, 10, 'tracked')).toBe('MEDIUM');
    expect(classifyConfidence(6, 1.99, 10, 'tracked')).toBe('HIGH');
  });

  it('should return MEDIUM for the CRUD sample with its raw spread', () => {
    // [3.5, 4, 4.5, 4, 20]: mean 7.2, population stdDev ~6.4
    expect(classifyConfidence(5, 6.4, 7.2, 'tracked')).toBe('MEDIUM');
  });

  it('should honour custom thresholds', () => {
    const thresholds = { minPointsForHigh: 3, maxCv: 0.5 };
    expect(classifyConfidence(3, 4, 10, 'tracked', thresholds)).toBe('HIGH');
    expect(classifyConfidence(3, 5, 10, 'tracked', thresholds)).toBe('MEDIUM');
  });

  it('should be deterministic', () => {
    const first = classifyConfidence(5, 0.5, 4, 'tracked');
    const second = classifyConfidence(5, 0.5, 4, 'tracked');
    expect(first).toBe(second);
  });
});

describe('overallConfidence', () => {
  it('should return the lowest level in the list', () => {
    expect(overallConfidence(['HIGH', 'MEDIUM', 'HIGH'])).toBe('MEDIUM');
    expect(overallConfidence(['MEDIUM', 'LOW', 'HIGH'])).toBe('LOW');
  });

  it('should return HIGH when every item is HIGH', () => {
    expect(overallConfidence(['HIGH', 'HIGH'])).toBe('HIGH');
  });

  it('should return HIGH for an empty list', () => {
    expect(overallConfidence([])).toBe('HIGH');
  });
});
