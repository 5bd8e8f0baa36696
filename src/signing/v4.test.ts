/**
 * Tests for AWS Signature Version 4 implementation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createHash, createHmac } from 'crypto';
import {
  SignatureV4Signer,
  buildAuthorizationHeader,
  calculateSignature,
  createCanonicalRequest,
  createStringToSign,
  credentialScope,
  deriveSigningKey,
  sha256Hex,
} from './v4.js';
import { SigningKeyCache } from './cache.js';
import { SigningError } from './error.js';
import type { HttpRequest } from '../http/types.js';

const DATE = new Date('2026-10-19T08:05:09Z');
const CONTENT_TYPE = 'application/x-www-form-urlencoded';

function hmac(key: Buffer | string, data: string): Buffer {
  return createHmac('sha256', key).update(data).digest();
}

function sampleRequest(): HttpRequest {
  return {
    method: 'POST',
    url: 'https://email.us-east-1.amazonaws.com/',
    headers: {
      'content-type': CONTENT_TYPE,
      date: 'Mon, 19 Oct 2026 08:05:09 +0000',
      'user-agent': 'test-agent',
    },
    body: 'Action=SendEmail',
  };
}

describe('sha256Hex', () => {
  it('should hash the empty string', () => {
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('deriveSigningKey', () => {
  it('should chain four HMAC rounds', () => {
    const expected = hmac(hmac(hmac(hmac('AWS4test-secret', '20261019'), 'us-east-1'), 'email'), 'aws4_request');
    const key = deriveSigningKey('test-secret', '20261019', 'us-east-1', 'email');

    expect(key).toHaveLength(32);
    expect(key.equals(expected)).toBe(true);
  });
});

describe('credentialScope', () => {
  it('should join date, region and service', () => {
    expect(credentialScope('20261019', 'us-east-1', 'email')).toBe('20261019/us-east-1/email/aws4_request');
  });
});

describe('createCanonicalRequest', () => {
  it('should join the components with newlines', () => {
    const canonical = createCanonicalRequest({
      method: 'post',
      uri: '',
      query: '',
      headers: 'host:example.com\n',
      signedHeaders: 'host',
      payloadHash: 'abc',
    });

    expect(canonical).toBe('POST\n/\n\nhost:example.com\n\nhost\nabc');
  });
});

describe('createStringToSign', () => {
  it('should start with the algorithm', () => {
    expect(createStringToSign('20261019T080509Z', 'scope', 'hash')).toBe(
      'AWS4-HMAC-SHA256\n20261019T080509Z\nscope\nhash'
    );
  });
});

describe('buildAuthorizationHeader', () => {
  it('should format credential, signed headers and signature', () => {
    expect(buildAuthorizationHeader('id', 'scope', 'a;b', 'sig')).toBe(
      'AWS4-HMAC-SHA256 Credential=id/scope, SignedHeaders=a;b, Signature=sig'
    );
  });
});

describe('calculateSignature', () => {
  it('should return a hex HMAC', () => {
    const key = Buffer.from('key');
    expect(calculateSignature(key, 'data')).toBe(hmac(key, 'data').toString('hex'));
  });
});

describe('SignatureV4Signer', () => {
  let cache: SigningKeyCache;
  let signer: SignatureV4Signer;

  beforeEach(() => {
    cache = new SigningKeyCache();
    signer = new SignatureV4Signer(
      {
        region: 'us-east-1',
        service: 'email',
        credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
      },
      cache
    );
  });

  it('should add host and x-amz-date headers', () => {
    const signed = signer.sign(sampleRequest(), DATE);

    expect(signed.headers['host']).toBe('email.us-east-1.amazonaws.com');
    expect(signed.headers['x-amz-date']).toBe('20261019T080509Z');
    expect(signed.headers['user-agent']).toBe('test-agent');
    expect(signed.body).toBe('Action=SendEmail');
  });

  it('should sign content-type, date, host and x-amz-date', () => {
    const signed = signer.sign(sampleRequest(), DATE);

    expect(signed.headers['authorization']).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/20261019\/us-east-1\/email\/aws4_request, SignedHeaders=content-type;date;host;x-amz-date, Signature=[0-9a-f]{64}$/
    );
  });

  it('should compute the signature over the canonical request', () => {
    const canonicalRequest = [
      'POST',
      '/',
      '',
      `content-type:${CONTENT_TYPE}\n` +
        'date:Mon, 19 Oct 2026 08:05:09 +0000\n' +
        'host:email.us-east-1.amazonaws.com\n' +
        'x-amz-date:20261019T080509Z\n',
      'content-type;date;host;x-amz-date',
      createHash('sha256').update('Action=SendEmail').digest('hex'),
    ].join('\n');

    const stringToSign = [
      'AWS4-HMAC-SHA256',
      '20261019T080509Z',
      '20261019/us-east-1/email/aws4_request',
      createHash('sha256').update(canonicalRequest).digest('hex'),
    ].join('\n');

    const key = hmac(hmac(hmac(hmac('AWS4test-secret', '20261019'), 'us-east-1'), 'email'), 'aws4_request');
    const expected = hmac(key, stringToSign).toString('hex');

    const signed = signer.sign(sampleRequest(), DATE);
    expect(signed.headers['authorization']?.endsWith(`Signature=${expected}`)).toBe(true);
  });

  it('should be deterministic for a fixed date', () => {
    const first = signer.sign(sampleRequest(), DATE);
    const second = signer.sign(sampleRequest(), DATE);
    expect(second).toEqual(first);
  });

  it('should change the signature when the body changes', () => {
    const first = signer.sign(sampleRequest(), DATE);
    const second = signer.sign({ ...sampleRequest(), body: 'Action=SendRawEmail' }, DATE);
    expect(second.headers['authorization']).not.toBe(first.headers['authorization']);
  });

  it('should not modify the input request', () => {
    const request = sampleRequest();
    signer.sign(request, DATE);
    expect(request.headers).toEqual(sampleRequest().headers);
  });

  it('should lower-case header names', () => {
    const request = sampleRequest();
    const signed = signer.sign(
      { ...request, headers: { 'Content-Type': CONTENT_TYPE, Date: 'Mon, 19 Oct 2026 08:05:09 +0000' } },
      DATE
    );
    expect(signed.headers['content-type']).toBe(CONTENT_TYPE);
    expect(signed.headers['Content-Type']).toBeUndefined();
  });

  it('should reuse the derived signing key within a day', () => {
    signer.sign(sampleRequest(), DATE);
    signer.sign(sampleRequest(), new Date('2026-10-19T20:00:00Z'));
    expect(cache.size).toBe(1);

    signer.sign(sampleRequest(), new Date('2026-10-20T01:00:00Z'));
    expect(cache.size).toBe(2);
  });

  it('should not reuse keys across credentials sharing a cache', () => {
    const other = (shared: SigningKeyCache): SignatureV4Signer =>
      new SignatureV4Signer(
        {
          region: 'us-east-1',
          service: 'email',
          credentials: { accessKeyId: 'other-access-key', secretAccessKey: 'other-secret' },
        },
        shared
      );

    signer.sign(sampleRequest(), DATE);
    const shared = other(cache).sign(sampleRequest(), DATE);
    const fresh = other(new SigningKeyCache()).sign(sampleRequest(), DATE);

    expect(cache.size).toBe(2);
    expect(shared.headers['authorization']).toBe(fresh.headers['authorization']);
  });

  it('should reject an invalid date', () => {
    expect(() => signer.sign(sampleRequest(), new Date('invalid'))).toThrow(SigningError);
  });

  it('should reject an invalid URL', () => {
    let caught: unknown;
    try {
      signer.sign({ ...sampleRequest(), url: 'not a url' }, DATE);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SigningError);
    expect(caught).toMatchObject({ reason: 'INVALID_URL', code: 'SIGNING' });
  });
});
