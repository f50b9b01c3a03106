import type { AlbumState } from "../store/temp-photos.js";

export type AlbumRow = { albumId: string } & AlbumState;

export interface ColumnWidths {
  albumName: number;
  vendorId: number;
}

const DEFAULT_COLUMN_WIDTHS: ColumnWidths = {
  albumName: 24,
  vendorId: 24,
};

function fit(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value.padEnd(width);
}

/**
 * Format one album row for the jobs table
 */
export function formatAlbumRow(index: number, row: AlbumRow, columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): string {
  const name = row.state === "pending" ? row.album.name : "";
  const vendorId = row.state === "created" ? row.vendorAlbumId : "-";
  return ` ${String(index).padStart(2)}  ${fit(row.albumId, columns.albumName)} ${row.state.padEnd(12)} ${fit(name, columns.albumName)} ${vendorId.slice(0, columns.vendorId)}`;
}

/**
 * Print a formatted table of a job's albums
 */
export function printAlbumTable(rows: AlbumRow[], columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): void {
  console.log(` #   ${"Album".padEnd(columns.albumName)} State        ${"Pending name".padEnd(columns.albumName)} Vendor ID`);
  console.log("─".repeat(22 + columns.albumName * 2 + columns.vendorId));

  rows.forEach((row, i) => {
    console.log(formatAlbumRow(i + 1, row, columns));
  });
}
