import {
  AddressMismatchError,
  AlreadyExistsError,
  CorruptArchiveError,
  InvalidMnemonicError,
  InvalidTickerError,
  MissingSourceFilesError,
  PermissionDeniedError,
  ToolUnavailableError,
  ToolVersionMismatchError,
  WalletIoError,
  WrongPasswordError,
} from '@spo-wallet/wallet';
import { describe, expect, it } from 'vitest';

import { InvalidArgumentsError } from '../cli-error.js';
import { errorCodeFor, exitCodeToErrorCode } from '../cli-response.js';
import { exitCodeForError, ExitCodes } from '../exit-codes.js';

describe('exitCodeForError', () => {
  it('maps each wallet failure to its own exit code', () => {
    expect(exitCodeForError(new InvalidTickerError('my-pool', 'bad'))).toBe(2);
    expect(exitCodeForError(new AlreadyExistsError('/w/pledge'))).toBe(3);
    expect(exitCodeForError(new MissingSourceFilesError('/w', ['a']))).toBe(4);
    expect(exitCodeForError(new WrongPasswordError('/w/a.key'))).toBe(5);
    expect(exitCodeForError(new CorruptArchiveError('/w/a.enc', 'bad tag'))).toBe(6);
    expect(exitCodeForError(new PermissionDeniedError('/w', 'write'))).toBe(7);
    expect(exitCodeForError(new AddressMismatchError('TESTPOOL', 'pledge', 'base', 'differs'))).toBe(8);
    expect(exitCodeForError(new ToolUnavailableError('cardano-address', 'missing'))).toBe(9);
    expect(exitCodeForError(new ToolVersionMismatchError('cardano-address', '3.9.0', '3.12.0'))).toBe(9);
    expect(exitCodeForError(new InvalidMnemonicError('/w/m.txt', 'bad checksum'))).toBe(11);
    expect(exitCodeForError(new WalletIoError('/w', 'read', 'EIO'))).toBe(1);
  });

  it('maps argument problems to INVALID_ARGS and anything else to GENERAL_ERROR', () => {
    expect(exitCodeForError(new InvalidArgumentsError('Passwords do not match'))).toBe(ExitCodes.INVALID_ARGS);
    expect(exitCodeForError(new Error('boom'))).toBe(ExitCodes.GENERAL_ERROR);
  });
});

describe('errorCodeFor', () => {
  it('prefers the wallet error code over the exit code name', () => {
    const error = new ToolVersionMismatchError('cardano-cli', '7.1.0', '8.0.0');

    expect(errorCodeFor(error, ExitCodes.TOOL_UNAVAILABLE)).toBe('TOOL_VERSION_MISMATCH');
    expect(errorCodeFor(new Error('x'), ExitCodes.CANCELLED)).toBe('CANCELLED');
  });

  it('names every exit code', () => {
    expect(exitCodeToErrorCode(ExitCodes.INVALID_INPUT)).toBe('INVALID_INPUT');
    expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
  });
});
