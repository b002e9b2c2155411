/* --------------------------------------------------------------------------
 *  PatchDrift — Text encoding detection and round-tripping
 * ----------------------------------------------------------------------- */

import * as iconv from 'iconv-lite';
import * as jschardet from 'jschardet';
import { getOutputChannel } from './logger';

/**
 * File text together with what is needed to write it back byte for byte.
 */
export interface DecodedText {
  text: string;
  /** iconv-lite encoding name */
  encoding: string;
  /** The file started with a byte order mark */
  bom: boolean;
}

const MIN_CONFIDENCE = 0.7;

/** Lossless for any byte sequence; used when nothing better fits. */
const BYTE_FALLBACK = 'latin1';

const BOMS: ReadonlyArray<{ bytes: readonly number[]; encoding: string }> = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf8' },
  { bytes: [0xff, 0xfe], encoding: 'utf16le' },
  { bytes: [0xfe, 0xff], encoding: 'utf16be' },
];

function bomEncoding(buffer: Buffer): string | undefined {
  return BOMS.find(({ bytes }) => bytes.every((byte, i) => buffer[i] === byte))?.encoding;
}

function roundTrips(buffer: Buffer, encoding: string, bom: boolean): boolean {
  return encodeText(iconv.decode(buffer, encoding), encoding, bom).equals(buffer);
}

/**
 * Picks the encoding of `buffer`. Only an encoding that writes the same
 * bytes back is accepted; UTF-8 is tried before detection.
 */
export function detectEncoding(buffer: Buffer): { encoding: string; bom: boolean } {
  const fromBom = bomEncoding(buffer);
  if (fromBom && roundTrips(buffer, fromBom, true)) {
    return { encoding: fromBom, bom: true };
  }
  if (roundTrips(buffer, 'utf8', false)) {
    return { encoding: 'utf8', bom: false };
  }

  const detected = jschardet.detect(buffer);
  const candidate = detected.encoding;
  if (
    candidate &&
    detected.confidence >= MIN_CONFIDENCE &&
    iconv.encodingExists(candidate) &&
    roundTrips(buffer, candidate, false)
  ) {
    return { encoding: candidate, bom: false };
  }

  getOutputChannel().debug(
    `Encoding ${candidate || 'unknown'} (confidence ${detected.confidence}) does not round-trip; reading as ${BYTE_FALLBACK}`,
  );
  return { encoding: BYTE_FALLBACK, bom: false };
}

export function decodeText(buffer: Buffer): DecodedText {
  const { encoding, bom } = detectEncoding(buffer);
  return { text: iconv.decode(buffer, encoding), encoding, bom };
}

export function encodeText(text: string, encoding: string, bom = false): Buffer {
  return iconv.encode(text, encoding, { addBOM: bom });
}
