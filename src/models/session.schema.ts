import Joi from 'joi';
import { InitiateSessionRequest, RenewTokenRequest, SessionRecord } from './session.model';
import { ErrorFactory } from '../utils/error-handler';

export interface FieldError {
  field: string;
  message: string;
}

const basicCustomerInfoSchema = Joi.object({
  customerId: Joi.string().allow('').optional(),
  customerName: Joi.string().allow('').optional(),
  customerType: Joi.string().allow('').optional(),
}).unknown(true);

export const initiateSessionSchema = Joi.object<InitiateSessionRequest>({
  cif: Joi.string().trim().min(1).required().description('Customer identification number'),
  basicCustomerInfo: basicCustomerInfoSchema.required(),
  tokenKey: Joi.string().trim().min(1).required().description('External session token key'),
  payload: Joi.object({
    channelId: Joi.string().trim().min(1).required(),
  }).unknown(true).required(),
});

export const renewTokenSchema = Joi.object<RenewTokenRequest>({
  refreshToken: Joi.string().trim().min(1).required(),
});

export const sessionRecordSchema = Joi.object<SessionRecord>({
  sessionId: Joi.string().required(),
  handle: Joi.string().required(),
  customerId: Joi.string().required(),
  businessUnit: Joi.string().required(),
  customerType: Joi.string().allow('').optional(),
  basicCustomerInfo: basicCustomerInfoSchema.required(),
  channelId: Joi.string().required(),
  externalTokenKey: Joi.string().required(),
  refreshTokenId: Joi.string().required(),
  correlationId: Joi.string().allow('').optional(),
  createdAt: Joi.number().integer().required(),
  updatedAt: Joi.number().integer().required(),
  expiresAt: Joi.number().integer().required(),
});

function toFieldErrors(error: Joi.ValidationError): FieldError[] {
  return error.details.map(detail => ({
    field: detail.path.join('.'),
    message: detail.message,
  }));
}

/**
 * Validates `input` against `schema` and returns the sanitised value, or
 * throws a VALIDATION_ERROR listing every failing field.
 */
export function validateOrThrow<T>(schema: Joi.ObjectSchema<T>, input: unknown, label: string): T {
  const { error, value } = schema.validate(input, { abortEarly: false, stripUnknown: false });

  if (error) {
    const errors = toFieldErrors(error);
    throw ErrorFactory.createValidationError(
      `Invalid ${label}: ${errors.map(e => e.message).join('; ')}`,
      undefined,
      { errors }
    );
  }

  return value;
}
