import type { Uint8 } from "semantic-types";

/**
 * Category of a response, given by the first digit of its status code.
 */
export enum StatusCategory {
  Input = 1,
  Success = 2,
  Redirect = 3,
  TemporaryFailure = 4,
  PermanentFailure = 5,
  ClientCertificateRequired = 6,
}

export function getStatusCategory(status: Uint8): StatusCategory | undefined {
  switch (Math.floor(status / 10)) {
    case 1:
      return StatusCategory.Input;
    case 2:
      return StatusCategory.Success;
    case 3:
      return StatusCategory.Redirect;
    case 4:
      return StatusCategory.TemporaryFailure;
    case 5:
      return StatusCategory.PermanentFailure;
    case 6:
      return StatusCategory.ClientCertificateRequired;
    default:
      return undefined;
  }
}
