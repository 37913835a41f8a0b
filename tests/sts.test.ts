import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { IdentityService } from '../src/services/sts.js';

const mockSend = jest.fn();

// Mock AWS SDK
jest.mock('@aws-sdk/client-sts', () => ({
  STSClient: jest.fn().mockImplementation(() => ({ send: mockSend })),
  GetCallerIdentityCommand: jest.fn(),
}));

describe('IdentityService', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should return the caller account id', async () => {
    mockSend.mockResolvedValue({ Account: '123456789012', Arn: 'arn:aws:iam::123456789012:user/ops' });
    const service = new IdentityService({ region: 'us-east-1', profile: 'audit' });

    await expect(service.getAccountId()).resolves.toBe('123456789012');
    expect(STSClient).toHaveBeenCalledWith({ region: 'us-east-1', profile: 'audit' });
    expect(GetCallerIdentityCommand).toHaveBeenCalledWith({});
  });

  it('should raise IdentityUnavailable when the call fails', async () => {
    mockSend.mockRejectedValue(new Error('Could not load credentials from any providers'));
    const service = new IdentityService({ region: 'us-east-1' });

    await expect(service.getAccountId()).rejects.toMatchObject({
      code: 'IdentityUnavailable',
      fatal: true,
      message: 'Failed to resolve account id for caller: Could not load credentials from any providers',
    });
  });

  it('should raise IdentityUnavailable when no account is returned', async () => {
    mockSend.mockResolvedValue({});
    const service = new IdentityService({ region: 'us-east-1' });

    await expect(service.getAccountId()).rejects.toMatchObject({
      code: 'IdentityUnavailable',
      message: 'Failed to resolve account id for caller: GetCallerIdentity returned no account',
    });
  });
});
