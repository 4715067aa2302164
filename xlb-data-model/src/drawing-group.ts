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

import { createHash } from 'node:crypto';
import { InvalidArgumentError } from 'xlb-base-types';
import {
  Container, CreateBSE, DggAtom, EscherType, FindAtom, FindEscher, GetBSEReferences,
  MsoDrawingGroupRecord, ParseDgg, ParseEscher, SerializeEscher, SetBSEReferences, SHAPE_ID_BLOCK,
  type DggInfo, type EscherAtom, type EscherContainer, type EscherRecord, type PictureFormat,
} from 'xlb-records';

/**
 * the workbook's drawing group: the picture store (one BSE per picture,
 * each with a count of the shapes using it) and shape id bookkeeping for
 * sheet drawings.
 *
 * pictures are addressed by 1-based index into the store, which is what
 * shapes store. entries are never removed; a picture whose count drops
 * to zero stays in the store, unreferenced, so later indexes don't move.
 */
export class DrawingGroup {

  /** the DggContainer. other atoms in it (OPT, colors) are kept as they are. */
  protected root?: EscherContainer;

  protected info: DggInfo = { max_shape_id: 0, shapes_saved: 0, drawings_saved: 0, clusters: [] };

  /** true if there is anything to write */
  public get present(): boolean {
    return !!this.root;
  }

  public get picture_count(): number {
    return this.Pictures().length;
  }

  /** drawing group data, concatenated from one or more records */
  public Load(data: Uint8Array): void {
    const [root] = ParseEscher(data);
    if (root?.kind !== 'container' || root.type !== EscherType.DggContainer) {
      console.warn('unexpected drawing group structure; ignoring');
      return;
    }
    this.root = root;
    const dgg = FindAtom(root.children, EscherType.Dgg);
    if (dgg) {
      this.info = ParseDgg(dgg);
    }
  }

  /** add a picture to the store. returns its 1-based index. */
  public AddPicture(image: Uint8Array, format: PictureFormat): number {
    const uid = createHash('md5').update(image).digest();
    const store = this.Store();
    store.children.push(CreateBSE(image, format, new Uint8Array(uid)));
    store.instance = store.children.length;
    return store.children.length;
  }

  public GetReferenceCount(index: number): number {
    return GetBSEReferences(this.Picture(index));
  }

  /** adjust a picture's reference count. counts don't go below zero. */
  public AddReference(index: number, delta = 1): void {
    const bse = this.Picture(index);
    SetBSEReferences(bse, Math.max(0, GetBSEReferences(bse) + delta));
  }

  /**
   * reserve a drawing id for a new sheet drawing, and a cluster (block
   * of 1024 shape ids) for its shapes. returns the drawing id and the
   * first shape id in the block.
   */
  public CreateDrawing(): { drawing_id: number, first_shape_id: number } {

    this.Root();

    const used = new Set(this.info.clusters.map(cluster => cluster.drawing_id));
    let drawing_id = 1;
    while (used.has(drawing_id)) { drawing_id++; }

    this.info.clusters.push({ drawing_id, shapes_used: 0 });
    this.info.drawings_saved++;

    return { drawing_id, first_shape_id: this.info.clusters.length * SHAPE_ID_BLOCK };

  }

  /**
   * record a shape id as used. the cluster's count is one more than the
   * highest offset used in its block.
   */
  public RegisterShape(drawing_id: number, shape_id: number): void {

    const cluster = this.info.clusters.find(test => test.drawing_id === drawing_id);
    if (!cluster) {
      throw new InvalidArgumentError(`drawing ${drawing_id} is not registered`);
    }

    cluster.shapes_used = Math.max(cluster.shapes_used, (shape_id % SHAPE_ID_BLOCK) + 1);
    this.info.shapes_saved++;
    this.info.max_shape_id = Math.max(this.info.max_shape_id, shape_id + 1);

  }

  /**
   * the drawing group record. the Dgg atom is regenerated from our
   * bookkeeping; the rest of the tree goes out as it came in.
   */
  public ToRecord(): MsoDrawingGroupRecord | undefined {

    if (!this.root) {
      return undefined;
    }

    const children = this.root.children.map((child): EscherRecord =>
      child.type === EscherType.Dgg ? DggAtom(this.info) : child);

    return new MsoDrawingGroupRecord(SerializeEscher([{ ...this.root, children }]));

  }

  protected Root(): EscherContainer {
    if (!this.root) {
      this.root = Container(EscherType.DggContainer, [DggAtom(this.info)]);
    }
    return this.root;
  }

  /** the picture store, created (after the Dgg atom) if necessary */
  protected Store(): EscherContainer {

    const root = this.Root();
    const found = FindEscher(root.children, EscherType.BStoreContainer);
    if (found?.kind === 'container') {
      return found;
    }

    const store = Container(EscherType.BStoreContainer, [], 0);
    const dgg = root.children.findIndex(child => child.type === EscherType.Dgg);
    root.children.splice(dgg + 1, 0, store);
    return store;

  }

  protected Pictures(): EscherAtom[] {
    const store = this.root && FindEscher(this.root.children, EscherType.BStoreContainer);
    if (store?.kind !== 'container') {
      return [];
    }
    return store.children.filter((child): child is EscherAtom => child.kind === 'atom' && child.type === EscherType.BSE);
  }

  protected Picture(index: number): EscherAtom {
    const bse = this.Pictures()[index - 1];
    if (!bse) {
      throw new InvalidArgumentError(`picture index ${index} is outside the allowable range (1..${this.picture_count})`);
    }
    return bse;
  }

}
