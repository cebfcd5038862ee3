import { ErrorFactory, ErrorMessages } from '../utils/error-handler';

const SEGMENT_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Derives the internal handle `<prefix>-<BU>-<customerId>`. External systems
 * key on the handle, so the format must stay fixed.
 */
export class IdentityService {
  constructor(private readonly prefix: string = 'VPB') {
    if (!SEGMENT_PATTERN.test(prefix)) {
      throw new Error(`Invalid handle prefix: ${prefix}`);
    }
  }

  buildHandle(businessUnit: string, customerId: string): string {
    const bu = (businessUnit ?? '').trim().toUpperCase();
    const id = (customerId ?? '').trim();

    if (!bu || !SEGMENT_PATTERN.test(bu)) {
      throw ErrorFactory.createValidationError(
        `Invalid business unit: "${businessUnit}"`,
        ErrorMessages.INVALID_IDENTITY
      );
    }

    if (!id || !SEGMENT_PATTERN.test(id)) {
      throw ErrorFactory.createValidationError(
        `Invalid customer id: "${customerId}"`,
        ErrorMessages.INVALID_IDENTITY
      );
    }

    return `${this.prefix}-${bu}-${id}`;
  }
}
