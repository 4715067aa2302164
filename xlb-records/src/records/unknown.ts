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

import type { ByteWriter } from 'xlb-utils';
import { StandardRecord } from '../record-base';

/**
 * any record we don't interpret. payload and continuation boundaries are
 * written back exactly as read.
 */
export class UnknownRecord extends StandardRecord {

  constructor(public readonly sid: number, public data: Uint8Array) {
    super();
  }

  public Clone(): UnknownRecord {
    const clone = new UnknownRecord(this.sid, this.data.slice(0));
    if (this.fragments) {
      clone.SetFragments(this.fragments);
    }
    return clone;
  }

  public DataSize(): number {
    return this.data.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteBytes(this.data);
  }

}
