import { z } from 'zod';
import { InvalidArgumentError } from '@/services/storage/errors';
import type { CannedPolicy } from '@/services/storage/types';

const POLICY_VERSION = '2012-10-17';
const ARN_PREFIX = 'arn:aws:s3:::';

const READ_OBJECT_ACTIONS = ['s3:GetObject'];
const WRITE_OBJECT_ACTIONS = [
  's3:AbortMultipartUpload',
  's3:DeleteObject',
  's3:ListMultipartUploadParts',
  's3:PutObject',
];
const ALL_ACTIONS = 's3:*';
const BUCKET_ACTIONS = ['s3:GetBucketLocation', 's3:ListBucketMultipartUploads', 's3:ListBucket'];
const MANAGED_ACTIONS = new Set([...READ_OBJECT_ACTIONS, ...WRITE_OBJECT_ACTIONS, ...BUCKET_ACTIONS, ALL_ACTIONS]);
const LIST_PREFIX_CONDITION = 's3:prefix';

export const CANNED_POLICIES: readonly CannedPolicy[] = ['none', 'readonly', 'writeonly', 'readwrite'];

const stringOrList = z.union([z.string(), z.array(z.string())]);

const statementSchema = z
  .object({
    Sid: z.string().optional(),
    Effect: z.enum(['Allow', 'Deny']),
    Principal: z.union([z.literal('*'), z.object({ AWS: stringOrList }).passthrough()]).optional(),
    Action: stringOrList,
    Resource: stringOrList,
    Condition: z.record(z.record(stringOrList)).optional(),
  })
  .passthrough();

const policySchema = z
  .object({
    Version: z.string().default(POLICY_VERSION),
    Statement: z.array(statementSchema).default([]),
  })
  .passthrough();

type PolicyStatement = z.infer<typeof statementSchema>;
type PolicyDocument = z.infer<typeof policySchema>;

const asList = (value: string | string[] | undefined): string[] => {
  if (value === undefined) {
    return [];
  }
  return typeof value === 'string' ? [value] : value;
};

export const isCannedPolicy = (value: string): value is CannedPolicy =>
  CANNED_POLICIES.some((policy) => policy === value);

const parsePolicy = (document: string | null): PolicyDocument => {
  if (document === null || document.trim() === '') {
    return { Version: POLICY_VERSION, Statement: [] };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(document);
  } catch (error) {
    throw new InvalidArgumentError('Bucket policy is not valid JSON', error);
  }
  const parsed = policySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError('Bucket policy has an unexpected shape', parsed.error);
  }
  return parsed.data;
};

const isPublicAllow = (statement: PolicyStatement): boolean => {
  if (statement.Effect !== 'Allow' || statement.Principal === undefined) {
    return false;
  }
  if (statement.Principal === '*') {
    return true;
  }
  return asList(statement.Principal.AWS).includes('*');
};

const bucketArn = (bucket: string): string => `${ARN_PREFIX}${bucket}`;

const objectArn = (bucket: string, prefix: string): string => `${ARN_PREFIX}${bucket}/${prefix}*`;

const toCanned = (actions: Set<string>): CannedPolicy => {
  const all = actions.has(ALL_ACTIONS);
  const readable = all || READ_OBJECT_ACTIONS.every((action) => actions.has(action));
  const writable = all || WRITE_OBJECT_ACTIONS.every((action) => actions.has(action));
  if (readable && writable) {
    return 'readwrite';
  }
  if (readable) {
    return 'readonly';
  }
  if (writable) {
    return 'writeonly';
  }
  return 'none';
};

const isPrefixArn = (resource: string, bucket: string): boolean =>
  resource.startsWith(`${bucketArn(bucket)}/`) && resource.endsWith('*');

/** The only condition canned statements carry: bucket listing limited to readable prefixes. */
const isListPrefixCondition = (statement: PolicyStatement, bucket: string): boolean => {
  const { Condition: condition } = statement;
  if (condition === undefined) {
    return false;
  }
  const operators = Object.keys(condition);
  const keys = Object.keys(condition.StringEquals ?? {});
  const actions = asList(statement.Action);
  const resources = asList(statement.Resource);
  return (
    operators.length === 1 &&
    keys.length === 1 &&
    keys[0] === LIST_PREFIX_CONDITION &&
    actions.length === 1 &&
    actions[0] === 's3:ListBucket' &&
    resources.every((resource) => resource === bucketArn(bucket))
  );
};

/**
 * Unconditional public grants on the bucket or its `<prefix>*` resources,
 * using canned actions only. These are regenerated on every rewrite; any
 * other statement is kept verbatim.
 */
const isManaged = (statement: PolicyStatement, bucket: string): boolean => {
  if (!isPublicAllow(statement)) {
    return false;
  }
  if (statement.Condition !== undefined && !isListPrefixCondition(statement, bucket)) {
    return false;
  }
  const resources = asList(statement.Resource);
  const actions = asList(statement.Action);
  return (
    resources.length > 0 &&
    resources.every((resource) => resource === bucketArn(bucket) || isPrefixArn(resource, bucket)) &&
    actions.every((action) => MANAGED_ACTIONS.has(action))
  );
};

/** Public object actions per object prefix of `bucket`, from managed statements. */
const objectGrants = (document: PolicyDocument, bucket: string): Map<string, Set<string>> => {
  const objectPrefix = `${bucketArn(bucket)}/`;
  const grants = new Map<string, Set<string>>();
  for (const statement of document.Statement) {
    if (!isManaged(statement, bucket)) {
      continue;
    }
    const actions = asList(statement.Action);
    for (const resource of asList(statement.Resource)) {
      if (!isPrefixArn(resource, bucket)) {
        continue;
      }
      const prefix = resource.slice(objectPrefix.length, -1);
      const granted = grants.get(prefix) ?? new Set<string>();
      for (const action of actions) {
        granted.add(action);
      }
      grants.set(prefix, granted);
    }
  }
  return grants;
};

const cannedRules = (document: PolicyDocument, bucket: string): Map<string, CannedPolicy> => {
  const rules = new Map<string, CannedPolicy>();
  for (const [prefix, actions] of objectGrants(document, bucket)) {
    const policy = toCanned(actions);
    if (policy !== 'none') {
      rules.set(prefix, policy);
    }
  }
  return rules;
};

/** Canned access granted on `prefix` of `bucket` by a raw policy document. */
export const cannedPolicyFor = (document: string | null, bucket: string, prefix: string): CannedPolicy =>
  cannedRules(parsePolicy(document), bucket).get(prefix) ?? 'none';

/**
 * Every canned rule at or below `prefix`, keyed by `<bucket>/<prefix>*`.
 */
export const cannedPolicyRules = (
  document: string | null,
  bucket: string,
  prefix: string
): Record<string, CannedPolicy> => {
  const result: Record<string, CannedPolicy> = {};
  const rules = [...cannedRules(parsePolicy(document), bucket)].sort(([left], [right]) =>
    left.localeCompare(right)
  );
  for (const [rulePrefix, policy] of rules) {
    if (rulePrefix.startsWith(prefix)) {
      result[`${bucket}/${rulePrefix}*`] = policy;
    }
  }
  return result;
};

const actionsFor = (policy: CannedPolicy): string[] => {
  switch (policy) {
    case 'readonly':
      return [...READ_OBJECT_ACTIONS];
    case 'writeonly':
      return [...WRITE_OBJECT_ACTIONS];
    case 'readwrite':
      return [...READ_OBJECT_ACTIONS, ...WRITE_OBJECT_ACTIONS];
    case 'none':
      return [];
  }
};

const statementsFor = (bucket: string, rules: Map<string, CannedPolicy>): PolicyStatement[] => {
  const entries = [...rules].sort(([left], [right]) => left.localeCompare(right));
  if (entries.length === 0) {
    return [];
  }

  const principal = { AWS: ['*'] };
  const readablePrefixes = entries
    .filter(([, policy]) => policy === 'readonly' || policy === 'readwrite')
    .map(([prefix]) => prefix);
  const anyWritable = entries.some(([, policy]) => policy === 'writeonly' || policy === 'readwrite');

  const statements: PolicyStatement[] = [
    {
      Effect: 'Allow',
      Principal: principal,
      Action: ['s3:GetBucketLocation', ...(anyWritable ? ['s3:ListBucketMultipartUploads'] : [])],
      Resource: [bucketArn(bucket)],
    },
  ];

  if (readablePrefixes.length > 0) {
    const listStatement: PolicyStatement = {
      Effect: 'Allow',
      Principal: principal,
      Action: ['s3:ListBucket'],
      Resource: [bucketArn(bucket)],
    };
    if (!readablePrefixes.includes('')) {
      listStatement.Condition = { StringEquals: { 's3:prefix': readablePrefixes } };
    }
    statements.push(listStatement);
  }

  for (const [prefix, policy] of entries) {
    statements.push({
      Effect: 'Allow',
      Principal: principal,
      Action: actionsFor(policy),
      Resource: [objectArn(bucket, prefix)],
    });
  }
  return statements;
};

/**
 * Rewrites a policy document so `prefix` of `bucket` grants exactly `policy`.
 * Unconditional public canned grants on the bucket are regenerated; everything
 * else is kept. Returns null when the resulting document has no statements.
 */
export const applyCannedPolicy = (
  document: string | null,
  bucket: string,
  prefix: string,
  policy: CannedPolicy
): string | null => {
  const parsed = parsePolicy(document);
  const rules = cannedRules(parsed, bucket);
  if (policy === 'none') {
    rules.delete(prefix);
  } else {
    rules.set(prefix, policy);
  }

  const statements = [
    ...parsed.Statement.filter((statement) => !isManaged(statement, bucket)),
    ...statementsFor(bucket, rules),
  ];
  if (statements.length === 0) {
    return null;
  }
  return JSON.stringify({ ...parsed, Statement: statements });
};
