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

export * from './sid';
export * from './continue';
export type { RecordBase } from './record-base';
export { StandardRecord } from './record-base';
export * from './record-types';
export * from './codec';
export * from './escher';

export * from './records/globals';
export * from './records/name';
export * from './records/sst';
export * from './records/cells';
export * from './records/sheet';
export * from './records/unknown';
export * from './records/strings';

export * from './ptg/ptg-types';
export * from './ptg/ptg-codec';
export * from './ptg/functions';
export * from './ptg/render';
