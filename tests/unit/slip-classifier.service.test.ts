import { logger } from '../../src/config/logger';
import { SlipClassifierService } from '../../src/services/slip-classifier.service';

describe('SlipClassifierService', () => {
  describe('classify', () => {
    it('should match canonical labels exactly', () => {
      expect(SlipClassifierService.classify('Referral')).toBe('referral');
      expect(SlipClassifierService.classify('One to One')).toBe('meeting');
      expect(SlipClassifierService.classify('TYFCB')).toBe('thank_you');
    });

    it('should tolerate case and surrounding or repeated whitespace', () => {
      expect(SlipClassifierService.classify('  referral ')).toBe('referral');
      expect(SlipClassifierService.classify('one  to   ONE')).toBe('meeting');
      expect(SlipClassifierService.classify('tyfcb')).toBe('thank_you');
    });

    it('should resolve synonyms', () => {
      expect(SlipClassifierService.classify('1-to-1')).toBe('meeting');
      expect(SlipClassifierService.classify('Thank You For Closed Business')).toBe('thank_you');
      expect(SlipClassifierService.classify('ref')).toBe('referral');
    });

    it('should leave logging of unknown values to the caller', () => {
      const warnSpy = jest.spyOn(logger, 'warn');

      expect(SlipClassifierService.classify('Lunch Meeting')).toBeNull();
      expect(warnSpy).not.toHaveBeenCalled();
      warnSpy.mockRestore();
    });

    it('should return null for empty, non-text and unknown values', () => {
      expect(SlipClassifierService.classify('')).toBeNull();
      expect(SlipClassifierService.classify(null)).toBeNull();
      expect(SlipClassifierService.classify(42)).toBeNull();
      expect(SlipClassifierService.classify('Lunch Meeting')).toBeNull();
    });
  });

  it('should expose canonical labels', () => {
    expect(SlipClassifierService.label('meeting')).toBe('One to One');
  });
});
