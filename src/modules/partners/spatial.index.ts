import { bboxContains, type BBox, type Position } from '../../shared/geo.js';

// Uniform grid over lng/lat: each entry is registered in every cell its
// bounding box touches, so a point lookup reads a single cell.
export class SpatialIndex {
    private readonly cells = new Map<string, Set<string>>();
    private readonly boxes = new Map<string, BBox>();

    constructor(private readonly cellDegrees = 1) {
        if (!(cellDegrees > 0)) throw new RangeError('cellDegrees must be positive');
    }

    get size(): number {
        return this.boxes.size;
    }

    insert(id: string, box: BBox): void {
        if (this.boxes.has(id)) this.remove(id);
        this.boxes.set(id, box);
        for (const key of this.cellKeys(box)) {
            let members = this.cells.get(key);
            if (!members) {
                members = new Set();
                this.cells.set(key, members);
            }
            members.add(id);
        }
    }

    remove(id: string): boolean {
        const box = this.boxes.get(id);
        if (!box) return false;
        for (const key of this.cellKeys(box)) {
            const members = this.cells.get(key);
            if (!members) continue;
            members.delete(id);
            if (members.size === 0) this.cells.delete(key);
        }
        return this.boxes.delete(id);
    }

    /** Ids whose bounding box contains the point, in insertion order. */
    search(point: Position): string[] {
        const members = this.cells.get(this.cellKey(this.cell(point[0]), this.cell(point[1])));
        if (!members) return [];
        const out: string[] = [];
        for (const id of members) {
            const box = this.boxes.get(id);
            if (box && bboxContains(box, point)) out.push(id);
        }
        return out;
    }

    private cell(v: number): number {
        return Math.floor(v / this.cellDegrees);
    }

    private cellKey(x: number, y: number): string {
        return `${x}:${y}`;
    }

    private *cellKeys(box: BBox): Generator<string> {
        for (let x = this.cell(box.minLng); x <= this.cell(box.maxLng); x++) {
            for (let y = this.cell(box.minLat); y <= this.cell(box.maxLat); y++) {
                yield this.cellKey(x, y);
            }
        }
    }
}
