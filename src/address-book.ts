import { EncodingError } from './errors.js';
import { type Felt, formatFelt, parseFelt } from './felt.js';
import { DEFAULT_UDC_ADDRESS } from './calls.js';
import { encodeShortString } from './hashing.js';

export type AddressBook = ReadonlyMap<string, Felt>;

// Source: starknet-io/starknet-addresses; the fee tokens and the UDC share
// their addresses on mainnet and Sepolia.
const PUBLIC_NETWORK: AddressBook = new Map([
  ['eth', parseFelt('0x049d36570d4e46f48e99674bd3fcc84644ddd6b96f7c741b1562b82f9e004dc7')],
  ['strk', parseFelt('0x04718f5a0fc34cc1af16a1cdee98ffb20c31f5cd61d6ab07201858f4287c938d')],
  ['udc', DEFAULT_UDC_ADDRESS],
]);

const BOOKS = new Map<bigint, AddressBook>([
  [encodeShortString('SN_MAIN'), PUBLIC_NETWORK],
  [encodeShortString('SN_SEPOLIA'), PUBLIC_NETWORK],
]);

export function addressBookFor(chainId: Felt): AddressBook | undefined {
  return BOOKS.get(chainId);
}

/** Looks up `name` (case-insensitive) among the well-known contracts of a chain. */
export function resolveAddress(name: string, chainId: Felt | undefined): Felt {
  if (chainId === undefined) {
    throw new EncodingError('Malformed', `'addr:${name}' needs to know the chain; it cannot be used here`);
  }
  const book = addressBookFor(chainId);
  if (!book) {
    throw new EncodingError('Malformed', `No address book for chain ${formatFelt(chainId)}`);
  }
  const address = book.get(name.toLowerCase());
  if (address === undefined) {
    throw new EncodingError('Malformed', `Unknown address name '${name}'. Known: ${[...book.keys()].join(', ')}`);
  }
  return address;
}
