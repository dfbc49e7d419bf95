/**
 * Nostr key handling and NIP-17 direct messages
 *
 * Thin layer over nostr-tools: identity parsing (npub / hex), secret key
 * parsing (nsec / hex), gift wrapping of kind 14 messages and unwrapping of
 * kind 1059 events addressed to us.
 */

import type { Event } from 'nostr-tools';
import { getPublicKey, verifyEvent } from 'nostr-tools/pure';
import { decrypt, getConversationKey } from 'nostr-tools/nip44';
import * as nip19 from 'nostr-tools/nip19';
import { wrapEvent } from 'nostr-tools/nip59';

export type NostrEvent = Event;

export const GIFT_WRAP_KIND = 1059;
export const DIRECT_MESSAGE_KIND = 14;
export const SEAL_KIND = 13;

const HEX_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

export interface NostrKeypair {
  secretKey: Uint8Array;
  pubkeyHex: string;
  npub: string;
}

export interface DirectMessage {
  senderPubkeyHex: string;
  content: string;
  createdAt: number;
  subject?: string;
}

export interface WrapOptions {
  subject?: string;
  replyTo?: string; // Event id (hex) being replied to
}

/**
 * Parses a recipient identity given as npub1... or 64 hex characters.
 * Returns the lowercase hex pubkey, or null when the text is neither.
 */
export function parseIdentity(text: string): string | null {
  const value = text.trim();

  if (value.startsWith('npub1')) {
    try {
      const decoded = nip19.decode(value);
      return decoded.type === 'npub' ? decoded.data : null;
    } catch {
      return null;
    }
  }

  if (HEX_KEY_PATTERN.test(value)) {
    return value.toLowerCase();
  }

  return null;
}

/**
 * Parses a secret key given as nsec1... or 64 hex characters.
 *
 * @throws Error when the text is neither format or fails bech32 decoding
 */
export function parseSecretKey(text: string): Uint8Array {
  const value = text.trim();

  if (value.startsWith('nsec1')) {
    const decoded = nip19.decode(value);
    if (decoded.type !== 'nsec') {
      throw new Error('Invalid private key format (expected nsec or 64-char hex)');
    }
    return decoded.data;
  }

  if (HEX_KEY_PATTERN.test(value)) {
    const buffer = Buffer.from(value, 'hex');
    const secretKey = Uint8Array.from(buffer);
    buffer.fill(0);
    return secretKey;
  }

  throw new Error('Invalid private key format (expected nsec or 64-char hex)');
}

/**
 * Derives the public half. Takes ownership of secretKey: the caller wipes
 * it through wipeKeypair once done.
 */
export function deriveKeypair(secretKey: Uint8Array): NostrKeypair {
  const pubkeyHex = getPublicKey(secretKey);
  return {
    secretKey,
    pubkeyHex,
    npub: nip19.npubEncode(pubkeyHex),
  };
}

export function wipeKeypair(keypair: NostrKeypair): void {
  keypair.secretKey.fill(0);
}

export function hexToNpub(pubkeyHex: string): string {
  return nip19.npubEncode(pubkeyHex);
}

/**
 * Display form used in the chat view and recv output: first 12 characters of the npub and "...".
 */
export function formatShortNpub(pubkeyHex: string): string {
  return `${nip19.npubEncode(pubkeyHex).slice(0, 12)}...`;
}

/**
 * Builds a kind 14 rumor for the recipient and gift wraps it (kind 1059).
 */
export function wrapDirectMessage(
  content: string,
  senderSecretKey: Uint8Array,
  recipientPubkeyHex: string,
  options: WrapOptions = {}
): NostrEvent {
  const tags: string[][] = [['p', recipientPubkeyHex]];
  if (options.subject) {
    tags.push(['subject', options.subject]);
  }
  if (options.replyTo) {
    tags.push(['e', options.replyTo, '', 'reply']);
  }

  return wrapEvent(
    {
      kind: DIRECT_MESSAGE_KIND,
      content,
      tags,
      created_at: Math.floor(Date.now() / 1000),
    },
    senderSecretKey,
    recipientPubkeyHex
  );
}

interface Rumor {
  kind: number;
  pubkey: string;
  content: string;
  created_at: number;
  tags: string[][];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isTagList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((tag) => Array.isArray(tag) && tag.every((item) => typeof item === 'string'));
}

function isRumor(value: unknown): value is Rumor {
  return (
    isRecord(value) &&
    typeof value.kind === 'number' &&
    typeof value.pubkey === 'string' &&
    typeof value.content === 'string' &&
    typeof value.created_at === 'number' &&
    isTagList(value.tags)
  );
}

function isSignedEvent(value: unknown): value is NostrEvent {
  return isRumor(value) && isRecord(value) && typeof value.id === 'string' && typeof value.sig === 'string';
}

/** Decrypts one NIP-44 layer written by authorPubkeyHex and parses the JSON inside. */
function openLayer(content: string, recipientSecretKey: Uint8Array, authorPubkeyHex: string): unknown {
  const conversationKey = getConversationKey(recipientSecretKey, authorPubkeyHex);
  return JSON.parse(decrypt(content, conversationKey));
}

function openSeal(wrap: NostrEvent, recipientSecretKey: Uint8Array): NostrEvent | null {
  const seal = openLayer(wrap.content, recipientSecretKey, wrap.pubkey);
  if (!isSignedEvent(seal) || seal.kind !== SEAL_KIND || !verifyEvent(seal)) {
    return null;
  }
  return seal;
}

/**
 * Opens a gift wrap addressed to us.
 *
 * The seal must carry a valid signature and the rumor must name the seal's
 * signer, who is reported as the sender. Returns null for anything else,
 * including wraps this key cannot decrypt: a shared relay subscription
 * routinely delivers those.
 */
export function unwrapDirectMessage(wrap: NostrEvent, recipientSecretKey: Uint8Array): DirectMessage | null {
  if (wrap.kind !== GIFT_WRAP_KIND) {
    return null;
  }

  let seal: NostrEvent | null;
  let rumor: unknown;
  try {
    seal = openSeal(wrap, recipientSecretKey);
    rumor = seal ? openLayer(seal.content, recipientSecretKey, seal.pubkey) : null;
  } catch {
    return null;
  }

  if (!seal || !isRumor(rumor) || rumor.kind !== DIRECT_MESSAGE_KIND || rumor.pubkey !== seal.pubkey) {
    return null;
  }

  const subjectTag = rumor.tags.find((tag) => tag[0] === 'subject');
  return {
    senderPubkeyHex: seal.pubkey,
    content: rumor.content,
    createdAt: Number.isInteger(rumor.created_at) && rumor.created_at > 0 ? rumor.created_at : 0,
    subject: subjectTag?.[1],
  };
}
