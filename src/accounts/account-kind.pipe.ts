import { BadRequestException, Injectable } from '@nestjs/common';
import type { PipeTransform } from '@nestjs/common';
import type { AccountKind } from './account.types.js';

const KINDS = new Map<string, AccountKind>([
  ['users', 'user'],
  ['organizations', 'organization'],
]);

/** Maps the `users|organizations` path segment to an account kind. */
@Injectable()
export class ParseAccountKindPipe implements PipeTransform<string, AccountKind> {
  transform(value: string): AccountKind {
    const kind = KINDS.get(value);
    if (!kind) {
      throw new BadRequestException(`Unknown account kind "${value}", expected users or organizations`);
    }
    return kind;
  }
}
