import { describe, it, expect } from 'vitest';
import {
  buildInvoicePayload,
  getPaymentPackage,
  parseInvoicePayload
} from '../../src/config/paymentPackages';
import { checkInvoice } from '../../src/handlers/paymentHandlers';

describe('invoice payloads', () => {
  it('builds and parses package:user payloads', () => {
    expect(buildInvoicePayload('premium_7d', 42)).toBe('premium_7d:42');
    expect(parseInvoicePayload('premium_7d:42')).toEqual({ packageId: 'premium_7d', userId: 42 });
  });

  it('rejects malformed payloads', () => {
    expect(parseInvoicePayload('premium_7d')).toBeNull();
    expect(parseInvoicePayload('premium_7d:')).toBeNull();
    expect(parseInvoicePayload('premium_7d:abc')).toBeNull();
    expect(parseInvoicePayload('a:1:2')).toBeNull();
  });

  it('only knows the configured packages', () => {
    expect(getPaymentPackage('premium_30d')?.stars).toBe(450);
    expect(getPaymentPackage('toString')).toBeNull();
  });
});

describe('checkInvoice', () => {
  it('accepts a matching payer, currency and amount', () => {
    expect(checkInvoice('premium_7d:42', 42, 'XTR', 150)).toEqual({
      valid: true,
      packageId: 'premium_7d'
    });
  });

  it('names the first problem it finds', () => {
    expect(checkInvoice('bad', 42, 'XTR', 150)).toEqual({
      valid: false,
      reason: 'malformed invoice payload'
    });
    expect(checkInvoice('premium_7d:41', 42, 'XTR', 150)).toEqual({
      valid: false,
      reason: 'payer does not match invoice'
    });
    expect(checkInvoice('gold:42', 42, 'XTR', 150)).toEqual({
      valid: false,
      reason: 'unknown package gold'
    });
    expect(checkInvoice('premium_7d:42', 42, 'USD', 150)).toEqual({
      valid: false,
      reason: 'unexpected currency USD'
    });
    expect(checkInvoice('premium_7d:42', 42, 'XTR', 100)).toEqual({
      valid: false,
      reason: 'amount 100 does not match price 150'
    });
  });
});
