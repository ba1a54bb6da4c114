import { BadRequestException, InternalServerErrorException } from '@nestjs/common';

export type ConnectionArgumentConflict =
  | 'ConflictingCursors'
  | 'BeforeWithFirst'
  | 'AfterWithLast'
  | 'FirstAndLastTogether'
  | 'InvalidPageSize';

const CONFLICT_MESSAGES: Record<Exclude<ConnectionArgumentConflict, 'InvalidPageSize'>, string> = {
  ConflictingCursors: 'cannot use both `after` and `before`',
  BeforeWithFirst: "'before' and 'first' cannot be specified simultaneously",
  AfterWithLast: "'after' and 'last' cannot be specified simultaneously",
  FirstAndLastTogether: 'first and last cannot be used together',
};

/** A combination of pagination arguments the Relay contract does not allow. */
export class ConnectionArgumentError extends BadRequestException {
  private constructor(
    readonly reason: ConnectionArgumentConflict,
    message: string,
  ) {
    super(message);
  }

  static conflict(reason: Exclude<ConnectionArgumentConflict, 'InvalidPageSize'>) {
    return new ConnectionArgumentError(reason, CONFLICT_MESSAGES[reason]);
  }

  static negativePageSize(argument: 'first' | 'last') {
    return new ConnectionArgumentError(
      'InvalidPageSize',
      `The "${argument}" parameter must be a non-negative number`,
    );
  }
}

/** The client sent a cursor that is not standard base64; pagination should restart. */
export class InvalidCursorError extends BadRequestException {
  constructor(readonly cursor: string) {
    super(`invalid cursor: ${JSON.stringify(cursor)}`);
  }
}

/** Reading or decoding a stored record failed part-way through a page. */
export class StoreReadError extends InternalServerErrorException {
  constructor(cause: unknown) {
    super(`failed to read database: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}
