/**
 * @fileoverview Printer wire protocol: request encoding, response decoding and types.
 */

export * from './protocol-types';
export { COMMAND_TERMINATOR, HANDSHAKE_REQUEST, encodeRequest, getCommandMnemonic } from './command-encoder';
export {
  RESPONSE_TERMINATOR,
  decodeHeadPosition,
  decodeIdentity,
  decodeProgress,
  decodeResponse,
  decodeStatus,
  decodeTemperatures,
  hasResponseTerminator,
  isPrintComplete,
  parseInlinePairs,
  parseKeyValueBody,
  unwrapDecodeResult
} from './response-parser';
