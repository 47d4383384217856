export const ERROR_CODES = [
  'NOT_PLAYING',
  'NOT_SCORING',
  'ALREADY_SCORED',
  'NOT_SCORED',
  'NOT_YOUR_TURN',
  'INVALID_PAYLOAD',
  'INVALID_VALUE',
  'INVALID_OPTION',
  'CARD_NOT_IN_HAND',
  'CARD_NOT_ON_TABLE',
  'STOLEN_CARD_NOT_ON_TOP',
  'STEAL_REQUIRES_HAND_CARD',
  'OWNS_OTHER_BUILD',
  'NO_CAPTURE_CARD',
  'NO_CAPTURE_OPTION',
  'NO_EXACT_PARTITION',
  'EMPTY_BUILD',
  'BUILD_NOT_FOUND',
  'NOT_BUILD_OWNER',
  'OWN_BUILD_INCREASE',
  'BUILD_AUGMENTED',
  'VALUE_EXCEEDS_MAX',
  'VALUE_MISMATCH',
  'DRIFT_BLOCKED',
  'MATCH_NOT_FOUND',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];
