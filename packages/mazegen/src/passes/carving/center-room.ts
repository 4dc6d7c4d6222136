import { CellLabel } from "../../core/grid";
import type { MazePass } from "../../pipeline/types";

/**
 * Open the square room around the maze center.
 */
export function carveCenterRoom(): MazePass<number> {
  return {
    id: "carving.center-room",
    run({ grid, layout }) {
      const { room } = layout;
      grid.fillRect(room, CellLabel.PATH);
      return (room.maxX - room.minX + 1) * (room.maxY - room.minY + 1);
    },
  };
}
