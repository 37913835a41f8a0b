import { PolicyAssessment, PolicyDocument, PolicyStatement } from '../types/index.js';

export const DENY_INSECURE_TRANSPORT_SID = 'DenyInsecureTransport';
export const LOG_DELIVERY_SID = 'S3ServerAccessLogsPolicy';
export const POLICY_VERSION = '2012-10-17';

const S3_ACTION = 's3:*';
const LOGGING_SERVICE_PRINCIPAL = 'logging.s3.amazonaws.com';

export function bucketArn(bucketName: string): string {
  return `arn:aws:s3:::${bucketName}`;
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function isFalse(value: unknown): boolean {
  return value === false || value === 'false';
}

/**
 * Owns the `DenyInsecureTransport` bucket policy statement: decides whether
 * a document already carries it and builds the document that does.
 */
export class TransportPolicyService {
  createDenyInsecureTransportStatement(bucketName: string): PolicyStatement {
    return {
      Sid: DENY_INSECURE_TRANSPORT_SID,
      Effect: 'Deny',
      Principal: '*',
      Action: S3_ACTION,
      Resource: [bucketArn(bucketName), `${bucketArn(bucketName)}/*`],
      Condition: { Bool: { 'aws:SecureTransport': 'false' } },
    };
  }

  createLogDeliveryStatement(bucketName: string, accountId: string): PolicyStatement {
    return {
      Sid: LOG_DELIVERY_SID,
      Effect: 'Allow',
      Principal: { Service: LOGGING_SERVICE_PRINCIPAL },
      Action: ['s3:PutObject'],
      Resource: `${bucketArn(bucketName)}/*`,
      Condition: { StringEquals: { 'aws:SourceAccount': accountId } },
    };
  }

  classify(policy: PolicyDocument | null, bucketName: string): PolicyAssessment {
    if (!policy) {
      return { classification: 'NotApplied', managedStatementCount: 0, issues: ['No bucket policy'] };
    }

    const managed = policy.Statement.filter(stmt => stmt.Sid === DENY_INSECURE_TRANSPORT_SID);

    const [statement, ...duplicates] = managed;

    if (!statement) {
      return {
        classification: 'NotApplied',
        managedStatementCount: 0,
        issues: [`No ${DENY_INSECURE_TRANSPORT_SID} statement`],
      };
    }

    if (duplicates.length > 0) {
      return {
        classification: 'NeedsChange',
        managedStatementCount: managed.length,
        issues: [`${managed.length} statements share Sid ${DENY_INSECURE_TRANSPORT_SID}`],
      };
    }

    const issues = this.findStatementIssues(statement, bucketName);

    return {
      classification: issues.length === 0 ? 'Applied' : 'NeedsChange',
      managedStatementCount: 1,
      issues,
    };
  }

  /**
   * Returns the full document to write back: every statement except the
   * managed one, in original order, followed by a fresh managed statement.
   * The bucket policy API replaces the whole document on write, so the
   * result must never be a partial update.
   */
  merge(policy: PolicyDocument | null, bucketName: string): PolicyDocument {
    const base: PolicyDocument = policy ?? { Version: POLICY_VERSION, Statement: [] };

    return {
      ...base,
      Statement: [
        ...base.Statement.filter(stmt => stmt.Sid !== DENY_INSECURE_TRANSPORT_SID),
        this.createDenyInsecureTransportStatement(bucketName),
      ],
    };
  }

  createLogSinkPolicy(bucketName: string, accountId: string): PolicyDocument {
    return this.merge(
      { Version: POLICY_VERSION, Statement: [this.createLogDeliveryStatement(bucketName, accountId)] },
      bucketName
    );
  }

  private findStatementIssues(statement: PolicyStatement, bucketName: string): string[] {
    const issues: string[] = [];

    if (statement.Effect !== 'Deny') {
      issues.push(`Effect is ${String(statement.Effect)}, expected Deny`);
    }

    if (statement.Principal !== '*') {
      issues.push(`Principal is ${JSON.stringify(statement.Principal)}, expected "*"`);
    }

    const actions = toList(statement.Action);
    if (!actions.includes(S3_ACTION) && !actions.includes('*')) {
      issues.push(`Action ${JSON.stringify(statement.Action)} does not cover ${S3_ACTION}`);
    }

    const resources = toList(statement.Resource);
    for (const arn of [bucketArn(bucketName), `${bucketArn(bucketName)}/*`]) {
      if (!resources.includes(arn)) {
        issues.push(`Resource is missing ${arn}`);
      }
    }

    if (!this.hasSecureTransportCondition(statement)) {
      issues.push('Condition is not Bool aws:SecureTransport = false');
    }

    return issues;
  }

  // Any extra operator or key would narrow the deny, so the block must be exact.
  private hasSecureTransportCondition(statement: PolicyStatement): boolean {
    const condition = statement.Condition;
    if (!condition) return false;

    const operators = Object.keys(condition);
    const bool = condition['Bool'];
    if (operators.length !== 1 || !bool) return false;

    const keys = Object.keys(bool);
    if (keys.length !== 1) return false;

    const value = bool['aws:SecureTransport'];
    if (Array.isArray(value)) {
      return value.length === 1 && isFalse(value[0]);
    }
    return isFalse(value);
  }
}
