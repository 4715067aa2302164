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
import { FormatError, InvalidStateError } from 'xlb-base-types';
import { Container, IsFileSource, type ContainerSource } from 'xlb-container';
import { WorkbookModel } from 'xlb-data-model';
import { Exporter } from './export';
import { Importer } from './import';

export interface OpenOptions {

  /** open a file source without write access. WriteInPlace will fail. */
  read_only: boolean;

  /**
   * carry the other streams and storages in the container (summary
   * information, macros, embedded objects) through to the output. if
   * false, the output holds the workbook stream and nothing else.
   */
  preserve_nodes: boolean;

  /** refuse data after the last EOF record instead of ignoring it */
  reject_trailing_data: boolean;

}

export const DefaultOpenOptions: OpenOptions = {
  read_only: false,
  preserve_nodes: true,
  reject_trailing_data: false,
};

/** anything with a synchronous Write, e.g. a buffer collector */
export interface WriteSink {
  Write(bytes: Uint8Array): void;
}

const WORKBOOK_STREAM = 'Workbook';

/** the pre-97 stream name; Get is case-insensitive, so this covers BOOK as well */
const BIFF5_STREAM = 'Book';

/**
 * a workbook file: the compound container, the name of the workbook
 * stream inside it, and the model that was read from (or will be written
 * to) that stream.
 *
 * the container stays open until Close. for a writable file source that
 * means the file descriptor stays open as well.
 */
export class WorkbookFile {

  protected closed = false;

  protected constructor(
    public readonly model: WorkbookModel,
    protected container: Container,
    protected stream_name: string,
    protected readonly options: OpenOptions,
  ) {}

  /** new, empty workbook. there are no sheets until you add one. */
  public static Create(options: Partial<OpenOptions> = {}): WorkbookFile {
    return new WorkbookFile(new WorkbookModel(), Container.Create(), WORKBOOK_STREAM, { ...DefaultOpenOptions, ...options });
  }

  /**
   * open from bytes, a file path (`{ path }`) or an iterable of chunks.
   * the option read_only applies to file sources; other sources can't be
   * written in place anyway.
   */
  public static Open(source: ContainerSource | string, options: Partial<OpenOptions> = {}): WorkbookFile {

    const composite: OpenOptions = { ...DefaultOpenOptions, ...options };

    const resolved: ContainerSource = typeof source === 'string'
      ? { path: source, read_only: composite.read_only }
      : IsFileSource(source)
        ? { ...source, read_only: source.read_only || composite.read_only }
        : source;

    const container = Container.Open(resolved);

    try {

      const node = container.Get(WORKBOOK_STREAM);

      if (!node || node.type !== 'stream') {
        if (container.HasStream(BIFF5_STREAM)) {
          throw new FormatError('biff5',
            'The supplied spreadsheet seems to be Excel 5.0/7.0 (BIFF5) format. Only BIFF8 workbooks (Excel 97 and later) are supported');
        }
        throw new FormatError('missing-workbook',
          `The supplied file has no workbook stream. Entries: ${container.Entries().map(entry => entry.path).join(', ') || '(none)'}`);
      }

      const importer = new Importer({ reject_trailing_data: composite.reject_trailing_data });
      const model = importer.Import(node.data);

      return new WorkbookFile(model, container, node.name, composite);

    }
    catch (err) {
      container.Close();
      throw err;
    }

  }

  /** serialize the model and return the full container image */
  public GetBytes(): Uint8Array {
    return this.PrepareContainer().ToBytes();
  }

  /** full rewrite, to a path or a sink. works for every source. */
  public Write(target: string | WriteSink): void {
    const bytes = this.GetBytes();
    if (typeof target === 'string') {
      fs.writeFileSync(target, bytes);
    }
    else {
      target.Write(bytes);
    }
  }

  /**
   * replace the workbook stream in the file we were opened from. the
   * workbook is serialized before the file is touched.
   */
  public WriteInPlace(): void {

    this.CheckOpen();

    if (!this.container.writable) {
      throw new InvalidStateError(
        this.container.mode === 'file'
          ? 'cannot write in place: the file was opened read-only'
          : `cannot write in place: the workbook was not opened from a writable file (${this.container.mode})`);
    }

    this.container.ReplaceStream(this.stream_name, new Exporter(this.model).Export());
    this.container.Commit();

  }

  /** release the container and any file handle. does not write anything. */
  public Close(): void {
    if (this.closed) { return; }
    this.closed = true;
    this.container.Close();
  }

  /**
   * the container to serialize. with preserve_nodes we write into the
   * source container (other entries come along as they are); otherwise
   * a fresh container with the same root class id.
   */
  protected PrepareContainer(): Container {

    this.CheckOpen();

    const stream = new Exporter(this.model).Export();

    if (this.options.preserve_nodes) {
      this.container.ReplaceStream(this.stream_name, stream);
      return this.container;
    }

    const container = Container.Create();
    container.SetRootClassId(this.container.GetRootClassId());
    container.ReplaceStream(WORKBOOK_STREAM, stream);
    return container;

  }

  protected CheckOpen() {
    if (this.closed) {
      throw new InvalidStateError('workbook file is closed');
    }
  }

}
