import { parsePolicyDocument } from '../src/services/policy-document.js';

describe('parsePolicyDocument', () => {
  it('should parse a policy with a statement list', () => {
    const json = JSON.stringify({
      Version: '2012-10-17',
      Id: 'Policy1',
      Statement: [
        {
          Sid: 'AllowRead',
          Effect: 'Allow',
          Principal: { AWS: ['arn:aws:iam::123456789012:root'] },
          Action: 's3:GetObject',
          Resource: 'arn:aws:s3:::app-data/*',
        },
      ],
    });

    expect(parsePolicyDocument(json)).toEqual({
      Version: '2012-10-17',
      Id: 'Policy1',
      Statement: [
        {
          Sid: 'AllowRead',
          Effect: 'Allow',
          Principal: { AWS: ['arn:aws:iam::123456789012:root'] },
          Action: 's3:GetObject',
          Resource: 'arn:aws:s3:::app-data/*',
        },
      ],
    });
  });

  it('should wrap a single statement object in a list', () => {
    const json = JSON.stringify({
      Version: '2012-10-17',
      Statement: { Effect: 'Deny', Principal: '*', NotAction: 's3:GetObject', Resource: '*' },
    });

    expect(parsePolicyDocument(json).Statement).toEqual([
      { Effect: 'Deny', Principal: '*', NotAction: 's3:GetObject', Resource: '*' },
    ]);
  });

  it('should default the version and statement list', () => {
    expect(parsePolicyDocument('{}')).toEqual({ Version: '2012-10-17', Statement: [] });
  });

  it('should reject a statement with an unknown effect', () => {
    const json = JSON.stringify({ Statement: [{ Effect: 'Maybe', Action: 's3:*' }] });

    expect(() => parsePolicyDocument(json)).toThrow('Statement 1 has an invalid Effect');
  });

  it('should reject a malformed condition block', () => {
    const json = JSON.stringify({ Statement: [{ Effect: 'Deny', Condition: { Bool: 'false' } }] });

    expect(() => parsePolicyDocument(json)).toThrow('Statement 1 has an invalid Condition');
  });

  it('should reject a document that is not an object', () => {
    expect(() => parsePolicyDocument('[]')).toThrow('Policy is not a JSON object');
  });
});
