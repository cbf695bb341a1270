import {
  PipeTransform,
  Injectable,
  ArgumentMetadata,
} from '@nestjs/common';
import { validate, type ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { InvalidRequestError } from '../../shared/domain/errors/domain.errors';

type Constructor = new (...args: unknown[]) => unknown;

/**
 * Turns request bodies into their DTO classes and validates them. Failures
 * surface as InvalidRequestError with the messages per field.
 */
@Injectable()
export class ValidationPipe implements PipeTransform<unknown> {
  async transform(value: unknown, { metatype }: ArgumentMetadata): Promise<unknown> {
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    const object: unknown = plainToInstance(metatype, value);
    if (typeof object !== 'object' || object === null) {
      throw new InvalidRequestError('Request body must be an object');
    }

    const errors = await validate(object, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (errors.length > 0) {
      throw new InvalidRequestError('Validation failed', { fields: this.collect(errors) });
    }

    return object;
  }

  private collect(errors: ValidationError[], prefix = ''): Record<string, string[]> {
    const details: Record<string, string[]> = {};
    for (const error of errors) {
      const field = prefix ? `${prefix}.${error.property}` : error.property;
      if (error.constraints) {
        details[field] = Object.values(error.constraints);
      }
      Object.assign(details, this.collect(error.children ?? [], field));
    }
    return details;
  }

  private toValidate(metatype: Constructor): boolean {
    const types: Constructor[] = [String, Boolean, Number, Array, Object];
    return !types.includes(metatype);
  }
}
