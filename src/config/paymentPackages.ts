export interface PaymentPackage {
  /** Price in the bot's in-app currency. */
  stars: number;
  days: number;
  title: string;
}

export const PAYMENT_CURRENCY = 'XTR';

export const PAYMENT_PACKAGES: Readonly<Record<string, PaymentPackage>> = {
  premium_7d: { stars: 150, days: 7, title: '7 Days Premium' },
  premium_30d: { stars: 450, days: 30, title: '30 Days Premium' }
};

export function getPaymentPackage(packageId: string): PaymentPackage | null {
  return Object.prototype.hasOwnProperty.call(PAYMENT_PACKAGES, packageId)
    ? PAYMENT_PACKAGES[packageId]
    : null;
}

/**
 * Invoice payloads are "<package>:<user id>".
 */
export function buildInvoicePayload(packageId: string, userId: number): string {
  return `${packageId}:${userId}`;
}

export function parseInvoicePayload(
  payload: string
): { packageId: string; userId: number } | null {
  const parts = payload.split(':');
  if (parts.length !== 2) return null;

  const [packageId, rawUserId] = parts;
  const userId = Number(rawUserId);
  if (!packageId || rawUserId === '' || !Number.isInteger(userId)) return null;

  return { packageId, userId };
}
