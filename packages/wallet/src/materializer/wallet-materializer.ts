import { randomBytes } from 'node:crypto';
import { renameSync } from 'node:fs';
import { join } from 'node:path';

import { validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { getLogger, registerSecret } from '@spo-wallet/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  accountForPurpose,
  derivationPathFor,
  formatDerivationPath,
  rolesForMode,
  STANDARD_ROLES,
  type KeyRole,
} from '../derivation/derivation-paths.js';
import {
  AddressMismatchError,
  AlreadyExistsError,
  InvalidMnemonicError,
  isErrnoCode,
  ToolUnavailableError,
  type WalletError,
} from '../errors.js';
import {
  discardPath,
  ensureDirectory,
  isNonEmptyDirectory,
  readFileIfExists,
  removePath,
  tryFs,
  writeNewFile,
} from '../fs/secure-fs.js';
import {
  credentialHex,
  decodeExtendedKeyPair,
  serializeEnvelope,
  signingKeyEnvelope,
  stakeDelegationCertificate,
  stakeRegistrationCertificate,
  verificationKeyEnvelope,
  type ExtendedKeyPair,
} from '../key-files/key-envelopes.js';
import {
  COMPLETE_KEY_STEMS,
  CREDENTIAL_ROLES,
  FILE_MODES,
  fileModeFor,
  isSensitiveFileName,
  purposeDirectory,
  sharedMnemonicPath,
  standardFileNames,
  tickerDirectory,
} from '../layout/wallet-layout.js';
import type { KeyMaterial, KeyProvider, ProviderKind } from '../providers/key-provider.js';
import { normalizeTicker, type Network, type Purpose, type WalletMode } from '../wallet-types.js';

const logger = getLogger('materializer');

export const MNEMONIC_WORD_COUNT = 24;

export interface WalletMaterializerOptions {
  /** Directory holding the `.CSPO_{TICKER}` trees, normally the user's home. */
  rootDir: string;
  provider: KeyProvider;
}

export interface GenerateWalletRequest {
  ticker: string;
  purpose: Purpose;
  network: Network;
  mode?: WalletMode | undefined;
  force?: boolean | undefined;
}

export interface MaterializedFile {
  path: string;
  mode: number;
  sensitive: boolean;
}

export interface GenerationResult {
  ticker: string;
  purpose: Purpose;
  network: Network;
  mode: WalletMode;
  provider: ProviderKind;
  walletDir: string;
  sharedMnemonicPath: string;
  mnemonicCreated: boolean;
  baseAddress: string;
  rewardAddress: string;
  paymentAddress?: string | undefined;
  derivationPaths: Partial<Record<KeyRole, string>>;
  files: MaterializedFile[];
}

export interface WalletLocation {
  ticker: string;
  walletDir: string;
  exists: boolean;
}

interface SharedMnemonic {
  phrase: string;
  created: boolean;
}

interface DerivedKeys {
  payment: KeyMaterial;
  staking: KeyMaterial;
  all: ReadonlyMap<KeyRole, KeyMaterial>;
}

interface DerivedAddresses {
  base: string;
  reward: string;
  enterprise?: string | undefined;
}

interface PlannedFile {
  name: string;
  content: string;
}

/**
 * Turns one generation request into the on-disk wallet for a
 * (ticker, purpose) pair.
 *
 * One ticker owns one recovery phrase, stored next to its purpose
 * directories. It is written once, before any key is derived, and never
 * rewritten. Purpose directories are built in a staging directory and
 * renamed into place, so a failed request never leaves a partial wallet.
 */
export class WalletMaterializer {
  private readonly rootDir: string;
  private readonly provider: KeyProvider;

  constructor(options: WalletMaterializerOptions) {
    this.rootDir = options.rootDir;
    this.provider = options.provider;
  }

  get providerKind(): ProviderKind {
    return this.provider.kind;
  }

  locate(rawTicker: string, purpose: Purpose): Result<WalletLocation, WalletError> {
    const ticker = normalizeTicker(rawTicker);
    if (ticker.isErr()) return err(ticker.error);

    const walletDir = purposeDirectory(this.rootDir, ticker.value, purpose);
    return isNonEmptyDirectory(walletDir).map((exists) => ({ ticker: ticker.value, walletDir, exists }));
  }

  generate(request: GenerateWalletRequest): Result<GenerationResult, WalletError> {
    const mode = request.mode ?? 'standard';
    const { purpose, network } = request;

    const location = this.locate(request.ticker, purpose);
    if (location.isErr()) return err(location.error);
    const { ticker, walletDir } = location.value;

    if (mode === 'complete' && !this.provider.producesValidKeys) {
      return err(
        new ToolUnavailableError(
          'cardano-address',
          `complete mode for ${ticker}/${purpose} needs valid Cardano keys, which the ${this.provider.kind} provider does not produce`
        )
      );
    }

    if (location.value.exists && !request.force) {
      return err(new AlreadyExistsError(walletDir, { ticker, purpose }));
    }

    const tickerDir = tickerDirectory(this.rootDir, ticker);
    const prepared = ensureDirectory(tickerDir, FILE_MODES.directory);
    if (prepared.isErr()) return err(prepared.error);

    const mnemonic = this.resolveSharedMnemonic(ticker);
    if (mnemonic.isErr()) return err(mnemonic.error);
    registerSecret(mnemonic.value.phrase);

    const account = accountForPurpose(purpose);
    const keys = this.deriveKeys(mnemonic.value.phrase, rolesForMode(mode), account);
    if (keys.isErr()) return err(keys.error);

    const addresses = this.encodeAddresses(keys.value, network, mode);
    if (addresses.isErr()) return err(addresses.error);

    const verified = this.crossVerify(ticker, purpose, network, mnemonic.value.phrase, account, addresses.value);
    if (verified.isErr()) {
      logger.error({ ticker, purpose, error: verified.error }, 'Address cross-verification failed');
      return err(verified.error);
    }

    const planned = this.planFiles(ticker, purpose, mnemonic.value.phrase, keys.value, addresses.value, mode);
    if (planned.isErr()) return err(planned.error);

    const files = this.commit(tickerDir, purpose, walletDir, planned.value, request.force === true);
    if (files.isErr()) return err(files.error);

    const derivationPaths: Partial<Record<KeyRole, string>> = {};
    for (const [role, material] of keys.value.all) {
      derivationPaths[role] = formatDerivationPath(material.path);
    }

    logger.info(
      { ticker, purpose, network, mode, provider: this.provider.kind, walletDir, fileCount: files.value.length },
      'Wallet generated'
    );

    return ok({
      ticker,
      purpose,
      network,
      mode,
      provider: this.provider.kind,
      walletDir,
      sharedMnemonicPath: sharedMnemonicPath(this.rootDir, ticker),
      mnemonicCreated: mnemonic.value.created,
      baseAddress: addresses.value.base,
      rewardAddress: addresses.value.reward,
      paymentAddress: addresses.value.enterprise,
      derivationPaths,
      files: files.value,
    });
  }

  /**
   * Load the ticker's phrase, or create it. Creation uses an exclusive open,
   * so when two runs race the first writer's phrase is the one both use.
   */
  private resolveSharedMnemonic(ticker: string): Result<SharedMnemonic, WalletError> {
    const path = sharedMnemonicPath(this.rootDir, ticker);

    const existing = readSharedMnemonic(path);
    if (existing.isErr()) return err(existing.error);
    if (existing.value !== undefined) {
      logger.info({ ticker }, 'Reusing shared recovery phrase');
      return ok({ phrase: existing.value, created: false });
    }

    const generated = this.provider.generateMnemonic();
    if (generated.isErr()) return err(generated.error);

    const written = writeNewFile({ path, content: `${generated.value}\n`, mode: FILE_MODES.secret });
    if (written.isErr()) {
      if (written.error.code !== 'ALREADY_EXISTS') return err(written.error);

      const winner = readSharedMnemonic(path);
      if (winner.isErr()) return err(winner.error);
      if (winner.value === undefined) {
        return err(new InvalidMnemonicError(path, 'file disappeared while it was being created'));
      }
      return ok({ phrase: winner.value, created: false });
    }

    logger.info({ ticker }, 'Created shared recovery phrase');
    return ok({ phrase: generated.value, created: true });
  }

  private deriveKeys(phrase: string, roles: readonly KeyRole[], account: number): Result<DerivedKeys, WalletError> {
    const root = this.provider.rootKeyFromMnemonic(phrase);
    if (root.isErr()) return err(root.error);

    const all = new Map<KeyRole, KeyMaterial>();
    for (const role of [...STANDARD_ROLES, ...roles.filter((r) => !STANDARD_ROLES.includes(r))]) {
      const path = derivationPathFor(role, account);
      const material = this.provider.deriveKey(root.value, path);
      if (material.isErr()) {
        logger.error(
          { role, path: formatDerivationPath(path), error: material.error.message },
          'Key derivation failed'
        );
        return err(material.error);
      }
      all.set(role, material.value);
    }

    const payment = all.get('payment');
    const staking = all.get('staking');
    if (!payment || !staking) {
      return err(new InvalidMnemonicError('input', 'payment and staking keys could not be derived'));
    }
    return ok({ payment, staking, all });
  }

  private encodeAddresses(keys: DerivedKeys, network: Network, mode: WalletMode): Result<DerivedAddresses, WalletError> {
    const base = this.provider.encodeAddress({
      kind: 'base',
      paymentKey: keys.payment.publicKey,
      stakingKey: keys.staking.publicKey,
      network,
    });
    if (base.isErr()) return err(base.error);

    const reward = this.provider.encodeAddress({ kind: 'reward', stakingKey: keys.staking.publicKey, network });
    if (reward.isErr()) return err(reward.error);

    if (mode === 'standard') {
      return ok({ base: base.value, reward: reward.value });
    }

    const enterprise = this.provider.encodeAddress({ kind: 'enterprise', paymentKey: keys.payment.publicKey, network });
    if (enterprise.isErr()) return err(enterprise.error);
    return ok({ base: base.value, reward: reward.value, enterprise: enterprise.value });
  }

  /**
   * Derive the payment and staking keys again from the phrase, through a
   * separate chain of provider calls, and require the same addresses.
   */
  private crossVerify(
    ticker: string,
    purpose: Purpose,
    network: Network,
    phrase: string,
    account: number,
    first: DerivedAddresses
  ): Result<void, WalletError> {
    if (!this.provider.validateAddress(first.base, network)) {
      return err(new AddressMismatchError(ticker, purpose, 'Base', `${first.base} is not a valid ${network} address`));
    }
    if (!this.provider.validateAddress(first.reward, network)) {
      return err(
        new AddressMismatchError(ticker, purpose, 'Reward', `${first.reward} is not a valid ${network} address`)
      );
    }

    const candidateKeys = this.deriveKeys(phrase, STANDARD_ROLES, account);
    if (candidateKeys.isErr()) return err(candidateKeys.error);
    const candidate = this.encodeAddresses(candidateKeys.value, network, 'standard');
    if (candidate.isErr()) return err(candidate.error);

    if (candidate.value.base !== first.base) {
      return err(
        new AddressMismatchError(ticker, purpose, 'Base', `derived ${first.base}, re-derived ${candidate.value.base}`)
      );
    }
    if (candidate.value.reward !== first.reward) {
      return err(
        new AddressMismatchError(
          ticker,
          purpose,
          'Reward',
          `derived ${first.reward}, re-derived ${candidate.value.reward}`
        )
      );
    }
    return ok(undefined);
  }

  private planFiles(
    ticker: string,
    purpose: Purpose,
    phrase: string,
    keys: DerivedKeys,
    addresses: DerivedAddresses,
    mode: WalletMode
  ): Result<PlannedFile[], WalletError> {
    const names = standardFileNames(ticker, purpose);
    const files: PlannedFile[] = [
      { name: names.baseAddress, content: `${addresses.base}\n` },
      { name: names.rewardAddress, content: `${addresses.reward}\n` },
      { name: names.stakingSigningKey, content: `${keys.staking.privateKey}\n` },
      { name: names.stakingVerificationKey, content: `${keys.staking.publicKey}\n` },
      { name: names.mnemonic, content: `${phrase}\n` },
    ];

    if (mode === 'standard') return ok(files);

    return planCompleteFiles(keys, addresses).map((complete) => [...files, ...complete]);
  }

  private commit(
    tickerDir: string,
    purpose: Purpose,
    walletDir: string,
    planned: PlannedFile[],
    replaceExisting: boolean
  ): Result<MaterializedFile[], WalletError> {
    const staging = join(tickerDir, `.${purpose}.staging-${randomBytes(4).toString('hex')}`);

    const created = ensureDirectory(staging, FILE_MODES.directory);
    if (created.isErr()) return err(created.error);

    for (const file of planned) {
      const written = writeNewFile({ path: join(staging, file.name), content: file.content, mode: fileModeFor(file.name) });
      if (written.isErr()) {
        discardPath(staging);
        return err(written.error);
      }
    }

    let previous: string | undefined;
    if (replaceExisting) {
      const aside = join(tickerDir, `.${purpose}.previous-${randomBytes(4).toString('hex')}`);
      const setAside = tryFs(walletDir, 'set aside existing wallet', () => {
        try {
          renameSync(walletDir, aside);
          return aside;
        } catch (error) {
          if (isErrnoCode(error, 'ENOENT')) return undefined;
          throw error;
        }
      });
      if (setAside.isErr()) {
        discardPath(staging);
        return err(setAside.error);
      }
      previous = setAside.value;
    }

    const moved = tryFs(walletDir, 'move staged wallet into', () => renameSync(staging, walletDir));
    if (moved.isErr()) {
      discardPath(staging);
      const setAsidePath = previous;
      if (setAsidePath !== undefined) {
        const restored = tryFs(walletDir, 'restore previous wallet', () => renameSync(setAsidePath, walletDir));
        if (restored.isErr()) {
          logger.error({ previous: setAsidePath, error: restored.error.message }, 'Previous wallet left aside');
        }
      }
      return err(moved.error);
    }

    if (previous !== undefined) {
      const removed = removePath(previous);
      if (removed.isErr()) {
        logger.warn({ previous, error: removed.error.message }, 'Could not remove the replaced wallet');
      }
    }

    return ok(
      planned.map((file) => ({
        path: join(walletDir, file.name),
        mode: fileModeFor(file.name),
        sensitive: isSensitiveFileName(file.name),
      }))
    );
  }
}

/**
 * Read and validate a shared phrase file. `undefined` when it does not exist.
 */
export function readSharedMnemonic(path: string): Result<string | undefined, WalletError> {
  const contents = readFileIfExists(path);
  if (contents.isErr()) return err(contents.error);
  const buffer = contents.value;
  if (buffer === undefined) return ok(undefined);

  const words = buffer
    .toString('utf8')
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0);
  if (words.length !== MNEMONIC_WORD_COUNT) {
    return err(new InvalidMnemonicError(path, `expected ${MNEMONIC_WORD_COUNT} words, found ${words.length}`));
  }
  const phrase = words.join(' ');
  if (!validateMnemonic(phrase, wordlist)) {
    return err(new InvalidMnemonicError(path, 'words or checksum do not form a BIP39 English phrase'));
  }
  return ok(phrase);
}

function planCompleteFiles(keys: DerivedKeys, addresses: DerivedAddresses): Result<PlannedFile[], WalletError> {
  const pairs = new Map<KeyRole, ExtendedKeyPair>();
  const files: PlannedFile[] = [
    { name: 'base.addr', content: `${addresses.base}\n` },
    { name: 'payment.addr', content: `${addresses.enterprise ?? ''}\n` },
    { name: 'reward.addr', content: `${addresses.reward}\n` },
  ];

  for (const [role, material] of keys.all) {
    const pair = decodeExtendedKeyPair(material, role);
    if (pair.isErr()) return err(pair.error);
    pairs.set(role, pair.value);

    const stem = COMPLETE_KEY_STEMS[role];
    files.push(
      { name: `${stem}.skey`, content: serializeEnvelope(signingKeyEnvelope(role, pair.value)) },
      { name: `${stem}.vkey`, content: serializeEnvelope(verificationKeyEnvelope(role, pair.value)) }
    );
  }

  for (const role of CREDENTIAL_ROLES) {
    const pair = pairs.get(role);
    if (pair) {
      files.push({ name: `${COMPLETE_KEY_STEMS[role]}.cred`, content: `${credentialHex(pair)}\n` });
    }
  }

  const stakePair = pairs.get('staking');
  const coldPair = pairs.get('cc-cold');
  if (stakePair && coldPair) {
    const stakeCredential = credentialHex(stakePair);
    files.push(
      { name: 'stake.cert', content: serializeEnvelope(stakeRegistrationCertificate(stakeCredential)) },
      {
        name: 'delegation.cert',
        content: serializeEnvelope(stakeDelegationCertificate(stakeCredential, credentialHex(coldPair))),
      }
    );
  }

  return ok(files);
}
