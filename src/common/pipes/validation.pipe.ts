import { ArgumentMetadata, BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';

/**
 * Global validation pipe for request payloads
 *
 * Turns plain bodies into DTO instances and checks their class-validator
 * constraints. Primitive parameters (route ids, query strings) pass through
 * untouched.
 *
 * @throws BadRequestException listing every failed constraint
 */
@Injectable()
export class ValidationPipe implements PipeTransform<unknown> {
  async transform(value: unknown, { metatype }: ArgumentMetadata): Promise<unknown> {
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new BadRequestException('Validation failed: request body must be a JSON object');
    }

    const object: object = plainToInstance(metatype, value);
    const errors = await validate(object);

    if (errors.length > 0) {
      const messages = errors.flatMap(error => Object.values(error.constraints ?? {}));
      throw new BadRequestException(`Validation failed: ${messages.join('; ')}`);
    }

    return object;
  }

  /**
   * Built-in types have no class-validator metadata to check
   */
  private toValidate(metatype: Function): boolean {
    const types: Function[] = [String, Boolean, Number, Array, Object];
    return !types.includes(metatype);
  }
}
