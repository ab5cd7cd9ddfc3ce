import Joi from 'joi';

import { ValidationError } from './errors';

export interface IntervalRecord {
  low: number;
  high: number;
}

export interface DomainBounds {
  minLow: number;
  maxHigh: number;
}

// Joi rejects numbers outside the safe integer range unless told otherwise
const bound = Joi.number().integer();

export const intervalRecordSchema: Joi.ObjectSchema<IntervalRecord> = Joi.object({
  low: bound.required(),
  high: bound.min(Joi.ref('low')).required(),
});

export const domainBoundsSchema: Joi.ObjectSchema<DomainBounds> = Joi.object({
  minLow: bound.required(),
  maxHigh: bound.min(Joi.ref('minLow')).required(),
});

export const validate = <T>(schema: Joi.AnySchema<T>, value: unknown): T => {
  const { error, value: validated } = schema.validate(value);
  if (error !== undefined) {
    let message = error.message;
    const details = error.details.map((d) => d.message).join(', ');
    if (details !== message) {
      message = `${message}: ${details}`;
    }
    throw new ValidationError(message);
  }
  return validated;
};
