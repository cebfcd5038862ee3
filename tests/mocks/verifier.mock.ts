import { ExternalVerifier, VerificationResult } from '../../src/services/verifier.service';
import { ErrorFactory } from '../../src/utils/error-handler';

export interface VerifyCall {
  sessionToken: string;
  userId: string;
  correlationId: string;
}

export type VerifierOutcome = 'valid' | 'expired' | 'unavailable';

/**
 * Scriptable external authority. Returns `valid` unless told otherwise.
 */
export class FakeVerifier implements ExternalVerifier {
  readonly calls: VerifyCall[] = [];
  private outcome: VerifierOutcome = 'valid';
  private gate?: Promise<void>;

  respondWith(outcome: VerifierOutcome): this {
    this.outcome = outcome;
    return this;
  }

  /**
   * Parks every verify call until the returned function is called.
   */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>(resolve => {
      release = resolve;
    });
    return () => {
      this.gate = undefined;
      release();
    };
  }

  async verify(sessionToken: string, userId: string, correlationId: string): Promise<VerificationResult> {
    this.calls.push({ sessionToken, userId, correlationId });
    if (this.gate) {
      await this.gate;
    }

    switch (this.outcome) {
      case 'valid':
        return { valid: true };
      case 'expired':
        return { valid: false };
      case 'unavailable':
        throw ErrorFactory.createVerificationUnavailableError('Session verification returned HTTP 503');
    }
  }
}
