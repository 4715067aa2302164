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

/**
 * a detached view of one directory entry. the container itself holds
 * the library's flat entry list; these are built on request.
 */
export interface EntryMetadata {
  name: string;
  class_id: Uint8Array;
  state_bits: number;
}

export interface StreamNode extends EntryMetadata {
  type: 'stream';
  data: Uint8Array;
}

export interface StorageNode extends EntryMetadata {
  type: 'storage' | 'root';
  children: DirectoryNode[];
}

export type DirectoryNode = StreamNode | StorageNode;

/** flat listing entry, returned by Container.Entries */
export interface EntryInfo {
  path: string;
  type: DirectoryNode['type'];
  size: number;
}

export const IsStorage = (node: DirectoryNode): node is StorageNode => {
  return node.type !== 'stream';
};

/**
 * names are limited to 31 UTF-16 code units and may not contain
 * path separators or the characters the format reserves.
 */
export const ValidateEntryName = (name: string): string | undefined => {
  if (!name.length) {
    return 'entry name is empty';
  }
  if (name.length > 31) {
    return `entry name is too long (${name.length} > 31): ${name}`;
  }
  if (/[/\\:!]/.test(name)) {
    return `entry name contains an illegal character: ${name}`;
  }
  return undefined;
};

/** split a slash-delimited path. leading and trailing slashes are ignored. */
export const SplitPath = (path: string): string[] => {
  return path.split('/').filter(part => part.length > 0);
};

/** class ids are held by the library as 32 hex digits */
export const ClassIdFromHex = (hex: string): Uint8Array => {
  const bytes = new Uint8Array(16);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16) || 0;
  }
  return bytes;
};

export const ClassIdToHex = (bytes: Uint8Array): string => {
  return Array.from(bytes).map(byte => byte.toString(16).padStart(2, '0')).join('');
};
