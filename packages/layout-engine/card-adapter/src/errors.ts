export type CardInputErrorCode =
  | 'INVALID_ENTITY'
  | 'INVALID_DESCRIPTION'
  | 'INVALID_LEGENDARY_ACTION'
  | 'IMAGE_NOT_FOUND'
  | 'UNSUPPORTED_IMAGE';

/** Raised for entity records that cannot become a card. `entity` names the offending record. */
export class CardInputError extends Error {
  readonly code: CardInputErrorCode;
  readonly entity: string;
  readonly details?: unknown;

  constructor(code: CardInputErrorCode, entity: string, message: string, details?: unknown) {
    super(message);
    Object.setPrototypeOf(this, CardInputError.prototype);
    this.name = 'CardInputError';
    this.code = code;
    this.entity = entity;
    this.details = details;
  }
}
