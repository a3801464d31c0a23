import { isValidSlackRequest } from '@slack/bolt';

export interface SignedRequest {
  signature: string | undefined;
  timestamp: string | undefined;
  body: string;
}

export type VerificationResult =
  | { valid: true }
  | {
      valid: false;
      reason: 'missing_headers' | 'malformed_timestamp' | 'expired' | 'mismatch';
      error: string;
    };

/**
 * Verify a Slack request signature. Header and timestamp problems are
 * reported separately from an HMAC mismatch; the HMAC itself is checked by
 * Bolt's `isValidSlackRequest`.
 */
export function verifySlackSignature(
  req: SignedRequest,
  signingSecret: string,
  maxAgeSeconds: number,
  nowMs: number = Date.now(),
): VerificationResult {
  if (!req.signature || !req.timestamp) {
    return {
      valid: false,
      reason: 'missing_headers',
      error: 'Missing X-Slack-Signature or X-Slack-Request-Timestamp header',
    };
  }

  if (!/^\d+$/.test(req.timestamp)) {
    return {
      valid: false,
      reason: 'malformed_timestamp',
      error: `Malformed request timestamp: ${req.timestamp}`,
    };
  }

  const timestamp = parseInt(req.timestamp, 10);
  const ageSeconds = Math.abs(nowMs / 1000 - timestamp);
  if (ageSeconds > maxAgeSeconds) {
    return {
      valid: false,
      reason: 'expired',
      error: `Request timestamp is ${Math.round(ageSeconds)}s old`,
    };
  }

  const matches = isValidSlackRequest({
    signingSecret,
    body: req.body,
    headers: {
      'x-slack-signature': req.signature,
      'x-slack-request-timestamp': timestamp,
    },
    nowMilliseconds: nowMs,
  });
  if (!matches) {
    return {
      valid: false,
      reason: 'mismatch',
      error: 'Signature mismatch',
    };
  }

  return { valid: true };
}
