import type { HeatmapSnapshotV1, PointV1 } from "@lanewatch/contracts";

export type HeatmapOptions = {
  frame_width: number;
  frame_height: number;
  cell_size_px: number;
  weight: number;
  decay: number;
};

// Row-major occupancy grid. Values only ever decay toward zero; nothing resets them.
export class HeatmapAccumulator {
  readonly cols: number;
  readonly rows: number;
  private readonly cells: Float64Array;

  constructor(private readonly options: HeatmapOptions) {
    this.cols = Math.ceil(options.frame_width / options.cell_size_px);
    this.rows = Math.ceil(options.frame_height / options.cell_size_px);
    this.cells = new Float64Array(this.cols * this.rows);
  }

  /**
   * Returns false for points outside the frame. The right and bottom edges are
   * inside: a box touching the frame bottom has its reference point on y = height.
   */
  add(point: PointV1): boolean {
    if (point.x < 0 || point.y < 0 || point.x > this.options.frame_width || point.y > this.options.frame_height) {
      return false;
    }
    const col = Math.min(this.cols - 1, Math.floor(point.x / this.options.cell_size_px));
    const row = Math.min(this.rows - 1, Math.floor(point.y / this.options.cell_size_px));
    this.cells[row * this.cols + col] += this.options.weight;
    return true;
  }

  decay(): void {
    for (let i = 0; i < this.cells.length; i++) this.cells[i] *= this.options.decay;
  }

  valueAt(col: number, row: number): number {
    if (col < 0 || row < 0 || col >= this.cols || row >= this.rows) return 0;
    return this.cells[row * this.cols + col];
  }

  snapshot(): HeatmapSnapshotV1 {
    const cells = Array.from(this.cells);
    let max = 0;
    for (const v of cells) if (v > max) max = v;
    return { cols: this.cols, rows: this.rows, cell_size_px: this.options.cell_size_px, max_value: max, cells };
  }
}
