// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

export type PlateSize = 1 | 2 | 6 | 24 | 96 | 384;

export const PLATE_SIZES: readonly PlateSize[] = [1, 2, 6, 24, 96, 384];

export interface PlateLayout {
  size: PlateSize;
  rows: number;
  columns: number;
}

const LAYOUTS: Record<PlateSize, { rows: number; columns: number }> = {
  1: { rows: 1, columns: 1 },
  2: { rows: 1, columns: 2 },
  6: { rows: 2, columns: 3 },
  24: { rows: 4, columns: 6 },
  96: { rows: 8, columns: 12 },
  384: { rows: 16, columns: 24 },
};

export function isPlateSize(value: number): value is PlateSize {
  return PLATE_SIZES.some((size) => size === value);
}

export function plateLayout(size: PlateSize): PlateLayout {
  return { size, ...LAYOUTS[size] };
}

/** Row labels A, B, C, ... */
export function rowLabels(layout: PlateLayout): string[] {
  return Array.from({ length: layout.rows }, (_, i) => String.fromCharCode(65 + i));
}

/** Column labels 1, 2, 3, ... */
export function columnLabels(layout: PlateLayout): string[] {
  return Array.from({ length: layout.columns }, (_, i) => String(i + 1));
}

/** Every well label on the plate in row-major order ("A1", "A2", ...). */
export function wellLabels(layout: PlateLayout): string[] {
  const columns = columnLabels(layout);
  return rowLabels(layout).flatMap((row) => columns.map((col) => `${row}${col}`));
}
