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

import function_data from './functions.json';

/**
 * built-in function table entry. `min` and `max` are argument counts;
 * functions with a fixed count are written as tFunc, the rest as tFuncVar
 * with an explicit count.
 */
export interface FunctionDescriptor {
  index: number;
  name: string;
  min: number;
  max: number;

  /** returns a reference rather than a value (INDEX, OFFSET, ...) */
  reference?: boolean;
}

/** index 255 calls a function named by its first argument (add-ins, macros) */
export const USER_DEFINED_FUNCTION = 255;

const by_index = new Map<number, FunctionDescriptor>();
const by_name = new Map<string, FunctionDescriptor>();

for (const entry of function_data) {
  const descriptor: FunctionDescriptor = { ...entry };
  by_index.set(descriptor.index, descriptor);
  by_name.set(descriptor.name.toUpperCase(), descriptor);
}

export const FunctionByIndex = (index: number): FunctionDescriptor | undefined => {
  return by_index.get(index);
};

export const FunctionByName = (name: string): FunctionDescriptor | undefined => {
  return by_name.get(name.toUpperCase());
};

export const IsFixedArity = (descriptor: FunctionDescriptor): boolean => {
  return descriptor.min === descriptor.max;
};
