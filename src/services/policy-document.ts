import { ConditionBlock, PolicyDocument, PolicyStatement } from '../types/index.js';
import { POLICY_VERSION } from './transport-policy.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringOrList(value: unknown): value is string | string[] {
  return typeof value === 'string' || (Array.isArray(value) && value.every(v => typeof v === 'string'));
}

function isPrincipal(value: unknown): value is PolicyStatement['Principal'] {
  return (
    typeof value === 'string' ||
    (isRecord(value) && Object.values(value).every(isStringOrList))
  );
}

function isConditionBlock(value: unknown): value is ConditionBlock {
  return isRecord(value) && Object.values(value).every(isRecord);
}

function parseStatement(value: unknown, index: number): PolicyStatement {
  if (!isRecord(value)) {
    throw new Error(`Statement ${index + 1} is not an object`);
  }

  const effect = value['Effect'];
  if (effect !== 'Allow' && effect !== 'Deny') {
    throw new Error(`Statement ${index + 1} has an invalid Effect`);
  }

  const checks: Array<[string, (v: unknown) => boolean]> = [
    ['Sid', v => typeof v === 'string'],
    ['Principal', isPrincipal],
    ['Action', isStringOrList],
    ['Resource', isStringOrList],
    ['Condition', isConditionBlock],
  ];
  for (const [key, check] of checks) {
    if (key in value && !check(value[key])) {
      throw new Error(`Statement ${index + 1} has an invalid ${key}`);
    }
  }

  // Keys are copied as-is so NotAction, NotPrincipal and friends survive a merge.
  const statement: PolicyStatement = { Effect: effect };
  for (const [key, field] of Object.entries(value)) {
    statement[key] = field;
  }
  return statement;
}

/**
 * Parses a bucket policy as returned by S3. A single statement object is
 * normalized to a one-element list.
 */
export function parsePolicyDocument(json: string): PolicyDocument {
  const raw: unknown = JSON.parse(json);
  if (!isRecord(raw)) {
    throw new Error('Policy is not a JSON object');
  }

  const version = typeof raw['Version'] === 'string' ? raw['Version'] : POLICY_VERSION;
  const rawStatements = raw['Statement'];
  const statements: unknown[] = Array.isArray(rawStatements)
    ? rawStatements
    : rawStatements === undefined
      ? []
      : [rawStatements];

  const document: PolicyDocument = {
    Version: version,
    Statement: statements.map((stmt, index) => parseStatement(stmt, index)),
  };
  if (typeof raw['Id'] === 'string') {
    document.Id = raw['Id'];
  }
  return document;
}
