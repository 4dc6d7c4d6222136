/**
 * Artifact Placer
 *
 * Scatters reward and danger cells over the corridors. No two artifacts,
 * including ones already on the grid, end up orthogonally adjacent.
 */

import { clampFillRatio } from "@labyrinth/contracts";
import { CoordSet } from "../../core/data-structures";
import { containsPoint, DIRECTIONS_4, type Point } from "../../core/geometry/types";
import {
  type ArtifactLabel,
  CellLabel,
  DANGER_LABELS,
  isArtifact,
  REWARD_LABELS,
  type ReadonlyGrid,
} from "../../core/grid";
import type { MazePass } from "../../pipeline/types";

/** Share of the placement target given to rewards; dangers take the rest. */
export const REWARD_SHARE = 0.4;

export interface ArtifactQuota {
  readonly requested: number;
  readonly rewards: number;
  readonly dangers: number;
}

export interface ArtifactPlacement {
  readonly position: Point;
  readonly label: ArtifactLabel;
}

export interface ArtifactSummary extends ArtifactQuota {
  readonly placements: readonly ArtifactPlacement[];
}

/**
 * Split `floor(pathCells * fillRatio)` into reward and danger counts.
 */
export function artifactQuota(pathCells: number, fillRatio: number): ArtifactQuota {
  const requested = Math.floor(pathCells * clampFillRatio(fillRatio));
  const rewards = Math.floor(requested * REWARD_SHARE);
  return { requested, rewards, dangers: requested - rewards };
}

function countPathCells(grid: ReadonlyGrid): number {
  let count = 0;
  grid.forEach((_x, _y, label) => {
    if (label === CellLabel.PATH) count++;
  });
  return count;
}

export function placeArtifactsPass(fillRatio: number): MazePass<ArtifactSummary> {
  return {
    id: "content.artifacts",
    run({ grid, layout }, ctx) {
      const quota = artifactQuota(countPathCells(grid), fillRatio);

      const positions: Point[] = [];
      grid.forEach((x, y, label) => {
        if (label === CellLabel.PATH && !containsPoint(layout.room, x, y)) {
          positions.push({ x, y });
        }
      });
      const candidates = ctx.rng.shuffle(positions);

      // Artifact cells, earlier placements included, and their neighbours
      const blocked = new CoordSet(grid.width, grid.height);
      const block = (x: number, y: number): void => {
        blocked.add(x, y);
        for (const dir of DIRECTIONS_4) {
          const nx = x + dir.x;
          const ny = y + dir.y;
          if (grid.isInBounds(nx, ny)) blocked.add(nx, ny);
        }
      };
      grid.forEach((x, y, label) => {
        if (isArtifact(label)) block(x, y);
      });

      const placements: ArtifactPlacement[] = [];

      const fill = (count: number, family: readonly ArtifactLabel[]): number => {
        let placed = 0;
        for (const pos of candidates) {
          if (placed >= count) break;
          if (blocked.has(pos.x, pos.y)) continue;

          const label = ctx.rng.choice(family);
          if (label === undefined) break;

          grid.setUnsafe(pos.x, pos.y, label);
          placements.push({ position: pos, label });
          placed++;
          block(pos.x, pos.y);
        }
        return placed;
      };

      const rewards = fill(quota.rewards, REWARD_LABELS);
      const dangers = fill(quota.dangers, DANGER_LABELS);

      ctx.trace.decision(
        "content.artifacts",
        "How many artifacts fit?",
        [quota.rewards, quota.dangers],
        { rewards, dangers },
        `Fill ratio ${fillRatio} over ${candidates.length} corridor cells`,
      );
      if (rewards + dangers < quota.requested) {
        ctx.trace.warning(
          "content.artifacts",
          `Placed ${rewards + dangers} of ${quota.requested} requested artifacts`,
        );
      }

      return { requested: quota.requested, rewards, dangers, placements };
    },
  };
}
