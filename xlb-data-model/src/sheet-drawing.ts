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

import { FormatError, InvalidArgumentError, InvalidStateError } from 'xlb-base-types';
import { ByteWriter } from 'xlb-utils';
import {
  CloneEscher, CreateDrawing, CreatePictureShape, DgAtom, EscherSize, EscherType, FindAllEscher,
  FindAtom, MsoDrawingRecord, ObjRecord, ParseEscher, PictureReferences, SetShapeId, ShapeId,
  SHAPE_ID_BLOCK, WriteEscher, CloneRecords,
  type BiffRecord, type EscherAtom, type EscherContainer, type EscherRecord, type PictureAnchor,
} from 'xlb-records';
import type { DrawingGroup } from './drawing-group';

/**
 * a sheet's drawing. in the file this is a run of MSODRAWING records,
 * which together hold one escher tree, with an OBJ record after each
 * shape's client data.
 *
 * if the run holds anything else (text boxes, comments, embedded chart
 * substreams) or the tree doesn't parse, we keep the records as they
 * are and the drawing can't be modified or cloned.
 */
export class SheetDrawing {

  /** picture indexes used by shapes, one entry per shape */
  public readonly references: number[];

  protected constructor(
    protected readonly tree?: EscherContainer,
    protected readonly objects: ObjRecord[] = [],
    protected readonly opaque?: BiffRecord[],
    references?: number[]) {
    this.references = references ?? (tree ? PictureReferences([tree]) : []);
  }

  /** true if we understood the drawing */
  public get editable(): boolean {
    return !!this.tree;
  }

  public get drawing_id(): number | undefined {
    return this.tree ? FindAtom([this.tree], EscherType.Dg)?.instance : undefined;
  }

  /** an empty drawing, registered with the drawing group */
  public static Create(group: DrawingGroup): SheetDrawing {
    const { drawing_id, first_shape_id } = group.CreateDrawing();
    group.RegisterShape(drawing_id, first_shape_id);
    return new SheetDrawing(CreateDrawing(drawing_id, first_shape_id));
  }

  /** from the record run, as read */
  public static FromRecords(records: BiffRecord[]): SheetDrawing {

    const chunks: Uint8Array[] = [];
    const objects: ObjRecord[] = [];
    let plain = true;

    for (const record of records) {
      if (record instanceof MsoDrawingRecord) {
        chunks.push(record.data);
      }
      else if (record instanceof ObjRecord) {
        objects.push(record);
      }
      else {
        plain = false;
      }
    }

    const data = new Uint8Array(chunks.reduce((sum, chunk) => sum + chunk.length, 0));
    let offset = 0;
    for (const chunk of chunks) {
      data.set(chunk, offset);
      offset += chunk.length;
    }

    let tree: EscherRecord | undefined;
    try {
      const list = ParseEscher(data);
      tree = list.length === 1 ? list[0] : undefined;
    }
    catch (err) {
      if (!(err instanceof FormatError)) {
        throw err;
      }
      console.warn('sheet drawing could not be parsed; keeping it as is');
    }

    if (!tree || tree.kind !== 'container' || tree.type !== EscherType.DgContainer) {
      return new SheetDrawing(undefined, [], records, []);
    }

    const client_data = FindAllEscher([tree], EscherType.ClientData).length;

    if (!plain || client_data !== objects.length) {
      return new SheetDrawing(undefined, [], records, PictureReferences([tree]));
    }

    return new SheetDrawing(tree, objects);

  }

  /**
   * add a picture frame shape. the caller has already checked that the
   * picture exists. returns the new shape id.
   */
  public InsertPicture(group: DrawingGroup, picture_index: number, anchor: PictureAnchor): number {

    const tree = this.Tree();
    const drawing_id = this.drawing_id ?? 0;

    const ids = this.Shapes().map(ShapeId);
    if (!ids.length) {
      throw new InvalidStateError('drawing has no group shape');
    }

    const last = Math.max(...ids);
    const first = last - (last % SHAPE_ID_BLOCK);
    const shape_id = last + 1;

    if (shape_id >= first + SHAPE_ID_BLOCK) {
      throw new InvalidArgumentError('too many shapes in this drawing');
    }

    const group_container = tree.children.find(child => child.type === EscherType.SpgrContainer);
    if (group_container?.kind !== 'container') {
      throw new InvalidStateError('drawing has no shape group');
    }

    group_container.children.push(CreatePictureShape(shape_id, picture_index, anchor));
    this.UpdateDg(drawing_id, ids.length + 1, shape_id);

    const object_id = this.objects.reduce((max, obj) => Math.max(max, obj.object_id ?? 0), 0) + 1;
    this.objects.push(ObjRecord.Picture(object_id));
    this.references.push(picture_index);

    group.RegisterShape(drawing_id, shape_id);
    group.AddReference(picture_index, 1);

    return shape_id;

  }

  /**
   * deep copy for a cloned sheet. the copy gets its own drawing id and
   * shape id block; shape ids keep their offset within the block. every
   * picture the drawing uses gains a reference.
   */
  public Clone(group: DrawingGroup): SheetDrawing {

    if (!this.tree) {
      throw new InvalidStateError('Cannot clone a sheet whose drawing contains charts, comments or text boxes');
    }

    const copy = CloneEscher(this.tree);
    if (copy.kind !== 'container') {
      throw new InvalidStateError('drawing has no root container');
    }

    const { drawing_id, first_shape_id } = group.CreateDrawing();
    const clone = new SheetDrawing(copy, CloneRecords(this.objects).filter((obj): obj is ObjRecord => obj instanceof ObjRecord));

    const shapes = clone.Shapes();
    let last = first_shape_id;

    for (const sp of shapes) {
      const shape_id = first_shape_id + (ShapeId(sp) % SHAPE_ID_BLOCK);
      SetShapeId(sp, shape_id);
      group.RegisterShape(drawing_id, shape_id);
      last = Math.max(last, shape_id);
    }

    clone.UpdateDg(drawing_id, shapes.length, last);

    for (const index of clone.references) {
      group.AddReference(index, 1);
    }

    return clone;

  }

  /** release picture references, when the sheet is removed */
  public Release(group: DrawingGroup): void {
    for (const index of this.references) {
      if (index <= group.picture_count) {
        group.AddReference(index, -1);
      }
    }
  }

  /**
   * records for the sheet stream: the tree is cut after each shape's
   * client data, and the matching OBJ goes in the gap.
   */
  public ToRecords(): BiffRecord[] {

    if (!this.tree) {
      return this.opaque ? this.opaque.slice(0) : [];
    }

    const writer = new ByteWriter(EscherSize(this.tree));
    const cuts: number[] = [];

    WriteEscher(writer, [this.tree], record => {
      if (record.type === EscherType.ClientData) {
        cuts.push(writer.position);
      }
    });

    const bytes = writer.Bytes();
    const records: BiffRecord[] = [];
    let start = 0;

    cuts.forEach((cut, index) => {
      records.push(new MsoDrawingRecord(bytes.slice(start, cut)));
      records.push(this.objects[index]);
      start = cut;
    });

    if (start < bytes.length) {
      records.push(new MsoDrawingRecord(bytes.slice(start)));
    }

    return records;

  }

  protected Tree(): EscherContainer {
    if (!this.tree) {
      throw new InvalidStateError('Cannot add shapes to a drawing that contains charts, comments or text boxes');
    }
    return this.tree;
  }

  protected Shapes(): EscherAtom[] {
    return this.tree
      ? FindAllEscher([this.tree], EscherType.Sp).filter((sp): sp is EscherAtom => sp.kind === 'atom')
      : [];
  }

  protected UpdateDg(drawing_id: number, count: number, last: number): void {
    const tree = this.Tree();
    const index = tree.children.findIndex(child => child.type === EscherType.Dg);
    const dg = DgAtom(drawing_id, count, last);
    if (index >= 0) {
      tree.children[index] = dg;
    }
    else {
      tree.children.unshift(dg);
    }
  }

}
