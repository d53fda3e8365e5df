/**
 * Tests for SigV4 request signing
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { AwsSignerV4 } from '../signing';

const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };
const timestamp = new Date('2024-03-05T06:07:08.000Z');
const url = new URL('http://s3.test.local/test-bucket/logs/out.000.00.csv');

describe('AwsSignerV4', () => {
  it('should add date, host and payload hash headers', () => {
    const signer = new AwsSignerV4(credentials, 'us-east-1');
    const signed = signer.sign('PUT', url, { 'Content-Length': '5' }, 'hello', timestamp);

    expect(signed.headers['host']).toBe('s3.test.local');
    expect(signed.headers['x-amz-date']).toBe('20240305T060708Z');
    expect(signed.headers['content-length']).toBe('5');
    expect(signed.headers['x-amz-content-sha256']).toBe(
      createHash('sha256').update('hello').digest('hex')
    );
    expect(signed.headers['x-amz-security-token']).toBeUndefined();
  });

  it('should build the authorization header from scope and signed headers', () => {
    const signer = new AwsSignerV4(credentials, 'eu-west-1');
    const signed = signer.sign('PUT', url, { 'content-length': '5' }, 'hello', timestamp);

    expect(signed.headers['authorization']).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/20240305\/eu-west-1\/s3\/aws4_request, SignedHeaders=content-length;host;x-amz-content-sha256;x-amz-date, Signature=[0-9a-f]{64}$/
    );
  });

  it('should hash an empty payload when there is no body', () => {
    const signer = new AwsSignerV4(credentials, 'us-east-1');
    const signed = signer.sign('HEAD', url, {}, undefined, timestamp);

    expect(signed.headers['x-amz-content-sha256']).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should be deterministic for a fixed timestamp', () => {
    const a = new AwsSignerV4(credentials, 'us-east-1').sign('PUT', url, {}, 'x', timestamp);
    const b = new AwsSignerV4(credentials, 'us-east-1').sign('PUT', url, {}, 'x', timestamp);

    expect(a.headers['authorization']).toBe(b.headers['authorization']);
  });

  it('should change the signature with the secret, body or path', () => {
    const base = new AwsSignerV4(credentials, 'us-east-1').sign('PUT', url, {}, 'x', timestamp);
    const otherSecret = new AwsSignerV4(
      { ...credentials, secretAccessKey: 'other-secret' },
      'us-east-1'
    ).sign('PUT', url, {}, 'x', timestamp);
    const otherBody = new AwsSignerV4(credentials, 'us-east-1').sign('PUT', url, {}, 'y', timestamp);
    const otherPath = new AwsSignerV4(credentials, 'us-east-1').sign(
      'PUT',
      new URL('http://s3.test.local/test-bucket/other.csv'),
      {},
      'x',
      timestamp
    );

    expect(otherSecret.headers['authorization']).not.toBe(base.headers['authorization']);
    expect(otherBody.headers['authorization']).not.toBe(base.headers['authorization']);
    expect(otherPath.headers['authorization']).not.toBe(base.headers['authorization']);
  });

  it('should sign the session token of temporary credentials', () => {
    const signer = new AwsSignerV4({ ...credentials, sessionToken: 'test-token' }, 'us-east-1');
    const signed = signer.sign('HEAD', url, {}, undefined, timestamp);

    expect(signed.headers['x-amz-security-token']).toBe('test-token');
    expect(signed.headers['authorization']).toContain(
      'SignedHeaders=host;x-amz-content-sha256;x-amz-date;x-amz-security-token,'
    );
  });
});
