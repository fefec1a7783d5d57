/**
 * Error classes public API
 */

export {
  PairingError,
  InvalidInputFileError,
  SheetNotFoundError,
  ColumnNotFoundError,
  InvalidOptionsError,
  OutputWriteError,
  isPairingError,
  errorMessage,
} from "./pairingErrors";
export type { PairingErrorCode } from "@/types";
