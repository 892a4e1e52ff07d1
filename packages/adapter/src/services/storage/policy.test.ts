import { describe, expect, it } from 'vitest';
import { isStorageError } from './errors';
import { applyCannedPolicy, cannedPolicyFor, cannedPolicyRules, isCannedPolicy } from './policy';

const statementsOf = (document: string | null): unknown[] => {
  if (document === null) {
    return [];
  }
  const parsed: unknown = JSON.parse(document);
  if (typeof parsed === 'object' && parsed !== null && 'Statement' in parsed && Array.isArray(parsed.Statement)) {
    return parsed.Statement;
  }
  return [];
};

describe('cannedPolicyFor', () => {
  it('reads public object grants for a prefix', () => {
    const document = JSON.stringify({
      Version: '2012-10-17',
      Statement: [
        { Effect: 'Allow', Principal: { AWS: '*' }, Action: 's3:GetObject', Resource: 'arn:aws:s3:::photos/public/*' },
        { Effect: 'Allow', Principal: '*', Action: ['s3:*'], Resource: ['arn:aws:s3:::photos/shared/*'] },
      ],
    });

    expect(cannedPolicyFor(document, 'photos', 'public/')).toBe('readonly');
    expect(cannedPolicyFor(document, 'photos', 'shared/')).toBe('readwrite');
    expect(cannedPolicyFor(document, 'photos', 'private/')).toBe('none');
    expect(cannedPolicyFor(null, 'photos', '')).toBe('none');
  });

  it('ignores grants to named principals and denials', () => {
    const document = JSON.stringify({
      Statement: [
        {
          Effect: 'Allow',
          Principal: { AWS: ['arn:aws:iam::123456789012:root'] },
          Action: 's3:GetObject',
          Resource: 'arn:aws:s3:::photos/*',
        },
        { Effect: 'Deny', Principal: '*', Action: 's3:GetObject', Resource: 'arn:aws:s3:::photos/*' },
      ],
    });

    expect(cannedPolicyFor(document, 'photos', '')).toBe('none');
  });

  it('rejects documents that are not JSON', () => {
    let thrown: unknown;
    try {
      cannedPolicyFor('{not json', 'photos', '');
    } catch (error) {
      thrown = error;
    }

    expect(isStorageError(thrown, 'InvalidArgument')).toBe(true);
  });
});

describe('applyCannedPolicy', () => {
  it('keeps statements it does not manage', () => {
    const deny = {
      Sid: 'DenyBucketDelete',
      Effect: 'Deny',
      Principal: '*',
      Action: 's3:DeleteBucket',
      Resource: 'arn:aws:s3:::photos',
    };
    const otherBucket = {
      Effect: 'Allow',
      Principal: '*',
      Action: ['s3:GetObject'],
      Resource: ['arn:aws:s3:::other/*'],
    };
    const document = JSON.stringify({ Version: '2012-10-17', Statement: [deny, otherBucket] });

    const statements = statementsOf(applyCannedPolicy(document, 'photos', 'inbox/', 'writeonly'));

    expect(statements).toEqual([
      deny,
      otherBucket,
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:GetBucketLocation', 's3:ListBucketMultipartUploads'],
        Resource: ['arn:aws:s3:::photos'],
      },
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:AbortMultipartUpload', 's3:DeleteObject', 's3:ListMultipartUploadParts', 's3:PutObject'],
        Resource: ['arn:aws:s3:::photos/inbox/*'],
      },
    ]);
  });

  it('keeps conditional and key-specific public grants verbatim', () => {
    const restricted = {
      Effect: 'Allow',
      Principal: '*',
      Action: ['s3:GetObject'],
      Resource: ['arn:aws:s3:::photos/*'],
      Condition: { IpAddress: { 'aws:SourceIp': '10.0.0.0/8' } },
    };
    const singleKey = {
      Effect: 'Allow',
      Principal: { AWS: '*' },
      Action: 's3:GetObject',
      Resource: 'arn:aws:s3:::photos/one.txt',
    };
    const document = JSON.stringify({ Version: '2012-10-17', Statement: [restricted, singleKey] });

    const rewritten = applyCannedPolicy(document, 'photos', 'uploads/', 'writeonly');

    expect(statementsOf(rewritten)).toEqual([
      restricted,
      singleKey,
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:GetBucketLocation', 's3:ListBucketMultipartUploads'],
        Resource: ['arn:aws:s3:::photos'],
      },
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:AbortMultipartUpload', 's3:DeleteObject', 's3:ListMultipartUploadParts', 's3:PutObject'],
        Resource: ['arn:aws:s3:::photos/uploads/*'],
      },
    ]);
    expect(cannedPolicyFor(rewritten, 'photos', '')).toBe('none');
  });

  it('keeps public grants that use actions outside the canned sets', () => {
    const tagging = {
      Effect: 'Allow',
      Principal: '*',
      Action: ['s3:GetObject', 's3:GetObjectTagging'],
      Resource: ['arn:aws:s3:::photos/tags/*'],
    };
    const document = JSON.stringify({ Statement: [tagging] });

    expect(statementsOf(applyCannedPolicy(document, 'photos', 'tags/', 'none'))).toEqual([tagging]);
  });

  it('limits bucket listing to readable prefixes', () => {
    const first = applyCannedPolicy(null, 'photos', 'a/', 'readonly');
    const second = applyCannedPolicy(first, 'photos', 'b/', 'readonly');

    expect(statementsOf(second)[1]).toEqual({
      Effect: 'Allow',
      Principal: { AWS: ['*'] },
      Action: ['s3:ListBucket'],
      Resource: ['arn:aws:s3:::photos'],
      Condition: { StringEquals: { 's3:prefix': ['a/', 'b/'] } },
    });
    expect(cannedPolicyRules(second, 'photos', '')).toEqual({
      'photos/a/*': 'readonly',
      'photos/b/*': 'readonly',
    });
    expect(cannedPolicyRules(second, 'photos', 'b')).toEqual({ 'photos/b/*': 'readonly' });
  });

  it('lists the whole bucket when the bucket itself is readable', () => {
    const statements = statementsOf(applyCannedPolicy(null, 'photos', '', 'readonly'));

    expect(statements[1]).toEqual({
      Effect: 'Allow',
      Principal: { AWS: ['*'] },
      Action: ['s3:ListBucket'],
      Resource: ['arn:aws:s3:::photos'],
    });
  });

  it('returns null once nothing is left', () => {
    const granted = applyCannedPolicy(null, 'photos', 'a/', 'readwrite');

    expect(applyCannedPolicy(granted, 'photos', 'a/', 'none')).toBeNull();
    expect(applyCannedPolicy(null, 'photos', 'a/', 'none')).toBeNull();
  });
});

describe('isCannedPolicy', () => {
  it('accepts only the four canned names', () => {
    expect(['none', 'readonly', 'writeonly', 'readwrite'].every(isCannedPolicy)).toBe(true);
    expect(isCannedPolicy('public')).toBe(false);
  });
});
