/**
 * Error taxonomy Unit Tests
 */

import { expect } from 'chai';
import {
  ActionFailure,
  AuthError,
  ConfigError,
  FarmhandError,
  TransientNetworkError,
  classifyError,
  isProxyError,
  isRetryableError,
} from '../errors';

describe('errors', () => {
  describe('isRetryableError', () => {
    it('should treat rate limits, resets and 5xx as retryable', () => {
      expect(isRetryableError(new Error('429 Too Many Requests'))).to.be.true;
      expect(isRetryableError(new Error('read ECONNRESET'))).to.be.true;
      expect(isRetryableError(new Error('Request failed with status code 503'))).to.be.true;
      expect(isRetryableError(new Error('Blockhash not found'))).to.be.true;
    });

    it('should not retry other failures', () => {
      expect(isRetryableError(new Error('Invalid signature'))).to.be.false;
      expect(isRetryableError(new ActionFailure('swap', 'timeout'))).to.be.false;
    });

    it('should always retry TransientNetworkError', () => {
      expect(isRetryableError(new TransientNetworkError('whatever'))).to.be.true;
    });
  });

  describe('classifyError', () => {
    it('should keep taxonomy errors as they are', () => {
      const error = new AuthError();
      expect(classifyError(error)).to.equal(error);
    });

    it('should map transient failures to TransientNetworkError', () => {
      const classified = classifyError(new Error('connect ETIMEDOUT 10.0.0.1:443'));
      expect(classified).to.be.instanceOf(TransientNetworkError);
      expect(classified.code).to.equal('TRANSIENT');
      expect(classified).to.have.property('isTimeout', false);
    });

    it('should map other values to ACTION_FAILED', () => {
      const classified = classifyError('plain string');
      expect(classified).to.be.instanceOf(FarmhandError);
      expect(classified.code).to.equal('ACTION_FAILED');
      expect(classified.message).to.equal('plain string');
    });
  });

  it('should recognise proxy failures', () => {
    expect(isProxyError(new Error('tunneling socket could not be established'))).to.be.true;
    expect(isProxyError(new Error('407 Proxy Authentication Required'))).to.be.true;
    expect(isProxyError(new Error('HTTP 400: bad request'))).to.be.false;
  });

  it('should list every issue in a ConfigError message', () => {
    const error = new ConfigError('Invalid settings', ['threads: too small', 'log_level: invalid']);
    expect(error.message).to.equal('Invalid settings\n  - threads: too small\n  - log_level: invalid');
    expect(error.issues).to.have.lengthOf(2);
  });

  it('should prefix ActionFailure messages with the action', () => {
    expect(new ActionFailure('faucet', 'already claimed').message).to.equal('faucet | already claimed');
  });
});
