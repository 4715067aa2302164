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

import * as fs from 'node:fs';
import * as CFB from 'cfb';
import { FormatError, InvalidArgumentError, InvalidStateError } from 'xlb-base-types';
import { CLASS_ID_LENGTH, EntryType, HEADER_SIZE, LIBRARY_SEED_STREAM } from './constants';
import { Classify, HasSignature } from './detect';
import {
  ClassIdFromHex, ClassIdToHex, IsStorage, SplitPath, ValidateEntryName,
  type DirectoryNode, type EntryInfo, type StorageNode,
} from './directory';

/** open a file by path. read_only files can be read but not committed. */
export interface FileSource {
  path: string;
  read_only?: boolean;
}

/**
 * bytes in memory are read-only by definition. an iterable of chunks is
 * treated as a stream: consumed once, fully, and never written back.
 */
export type ContainerSource = Uint8Array | FileSource | Iterable<Uint8Array>;

export type SourceMode = 'new' | 'buffer' | 'stream' | 'file';

export const IsFileSource = (source: unknown): source is FileSource => {
  return !!source && typeof source === 'object' && 'path' in source && typeof source.path === 'string';
};

const Concat = (chunks: Iterable<Uint8Array>): Uint8Array => {
  const list = Array.from(chunks);
  const result = new Uint8Array(list.reduce((sum, chunk) => sum + chunk.length, 0));
  let offset = 0;
  for (const chunk of list) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
};

const ReadAll = (fd: number): Uint8Array => {
  const size = fs.fstatSync(fd).size;
  const data = new Uint8Array(size);
  let offset = 0;
  while (offset < size) {
    const count = fs.readSync(fd, data, offset, size - offset, offset);
    if (!count) { break; }
    offset += count;
  }
  return offset === size ? data : data.slice(0, offset);
};

const Corrupt = (message: string): FormatError => {
  return new FormatError('corrupt', message);
};

const EntryTypeOf = (entry: CFB.CFB$Entry): number => {
  const type: number = entry.type;
  return type;
};

/** storage paths in the library's list end with a slash */
const StripSlash = (path: string): string => {
  return path.endsWith('/') ? path.slice(0, -1) : path;
};

const ParentPath = (path: string): string => {
  const stripped = StripSlash(path);
  return stripped.slice(0, stripped.lastIndexOf('/') + 1);
};

/**
 * parse with the container library. it reads a zip or a MIME file as
 * happily as a compound file, so we check the signature first. it also
 * stops quietly at a looping or broken sector chain, which leaves the
 * stream short; any stream whose bytes don't match its declared size
 * means the FAT and the directory disagree.
 */
const Parse = (data: Uint8Array): CFB.CFB$Container => {

  if (!HasSignature(data)) {
    throw Classify(data);
  }

  if (data.length < HEADER_SIZE) {
    throw Corrupt(`File is too short to hold a header (${data.length} bytes)`);
  }

  let doc: CFB.CFB$Container;

  try {
    doc = CFB.read(Buffer.from(data), { type: 'buffer' });
  }
  catch (err) {
    throw Corrupt(`Invalid compound file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const root = doc.FileIndex[0];
  if (!root || EntryTypeOf(root) !== EntryType.Root) {
    throw Corrupt('Directory does not start with a root entry');
  }

  for (const entry of doc.FileIndex) {
    if (EntryTypeOf(entry) !== EntryType.Stream) { continue; }
    const length = entry.content ? entry.content.length : 0;
    if (length !== entry.size) {
      throw Corrupt(`Stream "${entry.name}" declares ${entry.size} bytes but its chain holds ${length}`);
    }
  }

  return doc;

};

/**
 * a compound file: a tree of storages and streams, held by the container
 * library as a flat list of entries and full paths. lookups here are by
 * slash-delimited path relative to the root, and ignore case.
 *
 * containers opened from a writable file keep the descriptor open until
 * Close, so Commit can rewrite the same file.
 */
export class Container {

  protected fd?: number;
  protected closed = false;

  protected constructor(
    protected doc: CFB.CFB$Container,
    public readonly mode: SourceMode,
    public readonly read_only: boolean,
  ) {}

  /** create an empty container */
  public static Create(): Container {
    return new Container(CFB.utils.cfb_new(), 'new', false);
  }

  public static Open(source: ContainerSource): Container {

    if (source instanceof Uint8Array) {
      return new Container(Parse(source), 'buffer', true);
    }

    if (IsFileSource(source)) {
      const read_only = !!source.read_only;
      const fd = fs.openSync(source.path, read_only ? 'r' : 'r+');
      try {
        const container = new Container(Parse(ReadAll(fd)), 'file', read_only);
        container.fd = fd;
        return container;
      }
      catch (err) {
        fs.closeSync(fd);
        throw err;
      }
    }

    return new Container(Parse(Concat(source)), 'stream', true);

  }

  /** true if Commit can rewrite the original file */
  public get writable(): boolean {
    return this.mode === 'file' && !this.read_only && !this.closed;
  }

  public GetRootClassId(): Uint8Array {
    return ClassIdFromHex(this.doc.FileIndex[0].clsid || '');
  }

  public SetRootClassId(class_id: Uint8Array): void {
    if (class_id.length !== CLASS_ID_LENGTH) {
      throw new InvalidArgumentError(`class id must be ${CLASS_ID_LENGTH} bytes`);
    }
    this.doc.FileIndex[0].clsid = ClassIdToHex(class_id);
  }

  /** look up by path. the result is a detached copy. */
  public Get(path: string): DirectoryNode | undefined {
    const index = this.Locate(path);
    return index < 0 ? undefined : this.Node(index);
  }

  public HasStream(path: string): boolean {
    const index = this.Locate(path);
    return index > 0 && EntryTypeOf(this.doc.FileIndex[index]) === EntryType.Stream;
  }

  /** returns a copy of the stream data, or undefined if missing */
  public GetStream(path: string): Uint8Array | undefined {
    const node = this.Get(path);
    return node?.type === 'stream' ? node.data : undefined;
  }

  /** returns a detached copy of a storage (and everything below it) */
  public GetStorage(path: string): StorageNode | undefined {
    const node = this.Get(path);
    return node && IsStorage(node) ? node : undefined;
  }

  /**
   * write a stream, replacing it if it exists (and keeping its name and
   * class id) or creating it if not. the parent storage must exist.
   */
  public ReplaceStream(path: string, data: Uint8Array): void {

    const index = this.Locate(path);

    if (index === 0) {
      throw new InvalidArgumentError('empty path');
    }

    if (index > 0) {
      if (EntryTypeOf(this.doc.FileIndex[index]) !== EntryType.Stream) {
        throw new InvalidArgumentError(`${path} is a storage, not a stream`);
      }
      CFB.utils.cfb_add(this.doc, this.LibraryPath(index), Buffer.from(data));
      return;
    }

    const { parent, name } = this.Parent(path);
    CFB.utils.cfb_add(this.doc, this.LibraryPath(parent) + name, Buffer.from(data));

  }

  /** create a storage if it does not exist */
  public CreateStorage(path: string): void {

    const index = this.Locate(path);

    if (index === 0) {
      return;
    }

    if (index > 0) {
      if (EntryTypeOf(this.doc.FileIndex[index]) === EntryType.Stream) {
        throw new InvalidArgumentError(`${path} is a stream, not a storage`);
      }
      return;
    }

    // the library creates storages for the streams below them, so add
    // one and take it away again

    const { parent, name } = this.Parent(path);
    const placeholder = this.LibraryPath(parent) + name + '/placeholder';

    CFB.utils.cfb_add(this.doc, placeholder, Buffer.alloc(0));
    CFB.utils.cfb_del(this.doc, placeholder);
    CFB.utils.cfb_gc(this.doc);

  }

  /** returns true if something was removed */
  public RemoveEntry(path: string): boolean {

    const index = this.Locate(path);
    if (index <= 0) { return false; }

    const target = this.doc.FullPaths[index];
    const root = this.doc.FullPaths[0];

    // a storage goes with everything below it, deepest first

    const doomed = this.doc.FullPaths
      .filter(full => full === target || (target.endsWith('/') && full.startsWith(target)))
      .map(full => '/' + full.slice(root.length))
      .reverse();

    for (const entry of doomed) {
      CFB.utils.cfb_del(this.doc, entry);
    }

    CFB.utils.cfb_gc(this.doc);
    return true;

  }

  /** flat listing, in directory order */
  public Entries(): EntryInfo[] {
    const list: EntryInfo[] = [];
    this.doc.FileIndex.forEach((entry, index) => {
      if (index === 0 || this.Hidden(index)) { return; }
      const path = StripSlash(this.doc.FullPaths[index].slice(this.doc.FullPaths[0].length));
      if (EntryTypeOf(entry) === EntryType.Stream) {
        list.push({ path, type: 'stream', size: entry.content ? entry.content.length : 0 });
      }
      else {
        list.push({ path, type: 'storage', size: 0 });
      }
    });
    return list;
  }

  public ToBytes(): Uint8Array {
    this.CheckOpen();
    return this.Serialize();
  }

  /**
   * rewrite the file we were opened from. serialization happens before
   * anything touches the file, so a failure leaves it unchanged.
   */
  public Commit(): void {
    this.CheckOpen();
    if (!this.writable || this.fd === undefined) {
      throw new InvalidStateError(
        this.mode === 'file'
          ? 'cannot write in place: the file was opened read-only'
          : `cannot write in place: the container was not opened from a writable file (${this.mode})`);
    }
    const bytes = this.Serialize();
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(this.fd, bytes, offset, bytes.length - offset, offset);
    }
    fs.ftruncateSync(this.fd, bytes.length);
    fs.fsyncSync(this.fd);
  }

  /** release the file descriptor, if any. safe to call more than once. */
  public Close(): void {
    if (this.closed) { return; }
    this.closed = true;
    if (this.fd !== undefined) {
      const fd = this.fd;
      this.fd = undefined;
      fs.closeSync(fd);
    }
  }

  protected CheckOpen() {
    if (this.closed) {
      throw new InvalidStateError('container is closed');
    }
  }

  /** always version 3, 512-byte sectors */
  protected Serialize(): Uint8Array {
    const output: unknown = CFB.write(this.doc, { type: 'buffer' });
    if (!(output instanceof Uint8Array)) {
      throw new InvalidStateError('container library did not return a buffer');
    }
    return new Uint8Array(output);
  }

  protected Hidden(index: number): boolean {
    return this.doc.FileIndex[index].name === LIBRARY_SEED_STREAM;
  }

  /** index in the library's entry list, 0 for the root, -1 if missing */
  protected Locate(path: string): number {
    const parts = SplitPath(path);
    if (!parts.length) { return 0; }
    const target = (this.doc.FullPaths[0] + parts.join('/')).toUpperCase();
    return this.doc.FullPaths.findIndex((full, index) =>
      index > 0 && !this.Hidden(index) && StripSlash(full).toUpperCase() === target);
  }

  /**
   * the path as the library's add and delete functions take it: rooted,
   * with the stored case, and with a trailing slash for storages
   */
  protected LibraryPath(index: number): string {
    return '/' + this.doc.FullPaths[index].slice(this.doc.FullPaths[0].length);
  }

  protected Node(index: number): DirectoryNode {

    const entry = this.doc.FileIndex[index];
    const metadata = {
      name: entry.name,
      class_id: ClassIdFromHex(entry.clsid || ''),
      state_bits: entry.state || 0,
    };

    if (EntryTypeOf(entry) === EntryType.Stream) {
      return { ...metadata, type: 'stream', data: entry.content ? Uint8Array.from(entry.content) : new Uint8Array(0) };
    }

    const prefix = this.doc.FullPaths[index];
    const children: DirectoryNode[] = [];

    this.doc.FullPaths.forEach((full, child) => {
      if (child > 0 && child !== index && !this.Hidden(child) && ParentPath(full) === prefix) {
        children.push(this.Node(child));
      }
    });

    return { ...metadata, type: index === 0 ? 'root' : 'storage', children };

  }

  /** parent storage (by index) and the new entry's name */
  protected Parent(path: string): { parent: number, name: string } {
    const parts = SplitPath(path);
    const name = parts.pop();
    if (!name) {
      throw new InvalidArgumentError('empty path');
    }
    const message = ValidateEntryName(name);
    if (message) {
      throw new InvalidArgumentError(message);
    }
    const parent = this.Locate(parts.join('/'));
    if (parent < 0 || EntryTypeOf(this.doc.FileIndex[parent]) === EntryType.Stream) {
      throw new InvalidArgumentError(`no storage at ${parts.join('/') || '/'}`);
    }
    return { parent, name };
  }

}
