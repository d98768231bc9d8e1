/**
 * @fileoverview Encodes logical printer requests into wire command lines.
 *
 * Commands are vendor G-code mnemonics prefixed with `~` and terminated by CRLF.
 * The `control` request is the handshake every session must send before its real command.
 */

import type { PrinterRequest } from './protocol-types';

export const COMMAND_TERMINATOR = '\r\n';

/**
 * Handshake request sent first on every connection
 */
export const HANDSHAKE_REQUEST: PrinterRequest = { kind: 'control' };

/**
 * Get the G-code mnemonic for a request, without terminator
 */
export function getCommandMnemonic(request: PrinterRequest): string {
  switch (request.kind) {
    case 'control':
      return '~M601 S1';
    case 'info':
      return '~M115';
    case 'head-position':
      return '~M114';
    case 'temperature':
      return '~M105';
    case 'progress':
      return '~M27';
    case 'status':
      return '~M119';
    case 'set-temperature':
      return `~M104 S${request.temperature} T${request.toolIndex}`;
    default: {
      const exhaustive: never = request;
      return exhaustive;
    }
  }
}

/**
 * Encode a request into the exact text written to the socket
 */
export function encodeRequest(request: PrinterRequest): string {
  return `${getCommandMnemonic(request)}${COMMAND_TERMINATOR}`;
}
