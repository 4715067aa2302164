/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import { FormatError, SizeMismatchError } from 'xlb-base-types';
import { ByteReader, ByteWriter } from 'xlb-utils';
import type { RecordBase } from './record-base';
import { ParseRecord, type BiffRecord, type RawRecord } from './record-types';
import { RECORD_HEADER_SIZE, Sid } from './sid';

export interface DecodeOptions {

  /**
   * writers sometimes leave garbage after the last EOF. by default we log
   * and ignore it; set this to treat it as a corrupt stream.
   */
  reject_trailing_data: boolean;

}

export const DefaultDecodeOptions: DecodeOptions = {
  reject_trailing_data: false,
};

const Hex = (value: number) => '0x' + value.toString(16).padStart(4, '0');

/**
 * split a workbook stream into records, merging CONTINUE records into the
 * record they continue. substreams nest (charts embedded in a sheet have
 * their own BOF/EOF); the stream ends at the first top-level EOF that is
 * not followed by a BOF.
 */
export const SplitRecords = (bytes: Uint8Array, options: Partial<DecodeOptions> = {}): RawRecord[] => {

  const composite: DecodeOptions = { ...DefaultDecodeOptions, ...options };
  const reader = new ByteReader(bytes);
  const records: RawRecord[] = [];

  // payload pieces for the record being assembled
  let pieces: Uint8Array[] = [];
  let current: RawRecord | undefined;
  let depth = 0;

  const Flush = () => {
    if (current) {
      const data = new Uint8Array(current.fragments.reduce((a, b) => a + b, 0));
      let offset = 0;
      for (const piece of pieces) {
        data.set(piece, offset);
        offset += piece.length;
      }
      current.data = data;
      records.push(current);
    }
    current = undefined;
    pieces = [];
  };

  while (reader.remaining > 0) {

    const offset = reader.position;

    if (reader.remaining < RECORD_HEADER_SIZE) {
      throw new FormatError('corrupt', `Truncated record header at offset ${offset}`);
    }

    const sid = reader.ReadUInt16();
    const length = reader.ReadUInt16();

    if (length > reader.remaining) {
      throw new FormatError('corrupt',
        `Record ${Hex(sid)} at offset ${offset} declares ${length} bytes but only ${reader.remaining} remain`);
    }

    const payload = reader.ReadBytes(length);

    if (sid === Sid.CONTINUE && current) {
      current.fragments.push(length);
      pieces.push(payload);
      continue;
    }

    Flush();
    current = { sid, data: payload, fragments: [length], offset };
    pieces = [payload];

    if (sid === Sid.BOF) {
      depth++;
    }

    if (sid === Sid.EOF) {
      Flush();
      depth = Math.max(0, depth - 1);
      if (depth > 0) {
        continue;
      }
      if (reader.remaining >= 2 && (bytes[reader.position] | (bytes[reader.position + 1] << 8)) === Sid.BOF) {
        continue;
      }
      if (reader.remaining > 0) {
        if (composite.reject_trailing_data) {
          throw new FormatError('corrupt', `${reader.remaining} bytes of trailing data after the last EOF record`);
        }
        console.warn(`ignoring ${reader.remaining} bytes after the last EOF record`);
      }
      break;
    }

  }

  Flush();
  return records;

};

/** split and build typed records */
export const DecodeRecords = (bytes: Uint8Array, options: Partial<DecodeOptions> = {}): BiffRecord[] => {
  return SplitRecords(bytes, options).map(raw => ParseRecord(raw));
};

/** bytes each record actually writes, headers included */
export const MeasureRecords = (records: RecordBase[]): number[] => {
  return records.map(record => {
    const writer = new ByteWriter(record.RecordSize());
    record.Serialize(writer);
    return writer.position;
  });
};

/**
 * serialize records. the buffer is sized from declared sizes up front;
 * if any record writes more or less than it declared, we stop and throw
 * before returning anything.
 */
export const EncodeRecords = (records: RecordBase[]): Uint8Array => {

  const total = records.reduce((sum, record) => sum + record.RecordSize(), 0);
  const writer = new ByteWriter(total);

  for (const record of records) {
    const start = writer.position;
    const expected = record.RecordSize();
    record.Serialize(writer);
    const actual = writer.position - start;
    if (actual !== expected) {
      throw new SizeMismatchError(
        `Record ${Hex(record.sid)} wrote ${actual} bytes but declared ${expected}`,
        expected, actual, record.sid);
    }
  }

  return writer.Bytes();

};

/**
 * deep copy through the codec. records are copied one at a time, so
 * nested substreams (embedded charts) don't end the split early.
 */
export const CloneRecords = (records: RecordBase[]): BiffRecord[] => {
  return records.map(record => {
    const [raw] = SplitRecords(EncodeRecords([record]));
    return ParseRecord(raw);
  });
};
