import {
  createSampleValidator,
  isValidWalletAddress,
  parseNumberList,
  splitList
} from '../utils/validation';
import { PriceSample } from '../types/prices';
import { WALLET_A } from './helpers';

describe('Sample Validation', () => {
  const validator = createSampleValidator();
  const validSample: PriceSample = {
    timestamp: Date.UTC(2024, 0, 1),
    buyPrice: 0.002,
    sellPrice: 0.0019
  };

  describe('validateSample', () => {
    it('should validate a correct sample', () => {
      const result = validator.validateSample(validSample);
      expect(result.isValid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should reject non-positive prices', () => {
      const result = validator.validateSample({ ...validSample, buyPrice: 0, sellPrice: -1 });
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Invalid buy price: 0', 'Invalid sell price: -1']);
    });

    it('should reject non-finite prices', () => {
      const result = validator.validateSample({ ...validSample, buyPrice: Infinity });
      expect(result.errors).toEqual(['Invalid buy price: Infinity']);
    });

    it('should reject fractional timestamps', () => {
      const result = validator.validateSample({ ...validSample, timestamp: 1.5 });
      expect(result.errors).toEqual(['Invalid sample timestamp: 1.5']);
    });
  });
});

describe('Utility Functions', () => {
  describe('isValidWalletAddress', () => {
    it('should accept base58 addresses', () => {
      expect(isValidWalletAddress(WALLET_A)).toBe(true);
    });

    it('should reject other formats', () => {
      expect(isValidWalletAddress('')).toBe(false);
      expect(isValidWalletAddress('0xdeadbeef')).toBe(false);
      expect(isValidWalletAddress('O'.repeat(40))).toBe(false);
      expect(isValidWalletAddress('1'.repeat(45))).toBe(false);
    });
  });

  describe('list parsing', () => {
    it('should split and trim comma separated values', () => {
      expect(splitList(' a, ,b ,')).toEqual(['a', 'b']);
      expect(splitList(undefined)).toEqual([]);
    });

    it('should keep positive numbers and report the rest', () => {
      const rejected: string[] = [];
      expect(parseNumberList('0.002, abc, -1, 0.0015', entry => rejected.push(entry))).toEqual([0.002, 0.0015]);
      expect(rejected).toEqual(['abc', '-1']);
    });
  });
});
