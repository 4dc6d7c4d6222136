/**
 * Cell labels.
 *
 * A closed set of variants stored as one byte per cell. Each variant carries
 * its family, display name and weight in `CELL_LABEL_INFO`, a table typed so
 * that `CellWeight<typeof CellLabel.WITCH>` is the literal `9`.
 */

export const CellLabel = {
  WALL: 0,
  PATH: 1,
  START: 2,
  EXIT: 3,
  // Rewards
  MARSHMALLOWS: 4,
  GUMMY_BEARS: 5,
  COOKIES: 6,
  CANDY: 7,
  CHOCOLATE: 8,
  // Dangers
  ZOMBIE: 9,
  GHOST: 10,
  WITCH: 11,
  FOG: 12,
  SHADOWS: 13,
  CROW: 14,
  BLACK_CAT: 15,
  SKELETON: 16,
  SPIDER: 17,
  BAT: 18,
  PUMPKIN: 19,
} as const;

export type CellLabel = (typeof CellLabel)[keyof typeof CellLabel];

export type CellFamily = "structural" | "reward" | "danger";

export interface CellLabelInfo {
  readonly name: string;
  readonly family: CellFamily;
  readonly weight: number;
}

export const CELL_LABEL_INFO = {
  [CellLabel.WALL]: { name: "Wall", family: "structural", weight: 0 },
  [CellLabel.PATH]: { name: "Path", family: "structural", weight: 0 },
  [CellLabel.START]: { name: "Start", family: "structural", weight: 0 },
  [CellLabel.EXIT]: { name: "Exit", family: "structural", weight: 0 },
  [CellLabel.MARSHMALLOWS]: { name: "Marshmallows", family: "reward", weight: -2 },
  [CellLabel.GUMMY_BEARS]: { name: "Gummy Bears", family: "reward", weight: -3 },
  [CellLabel.COOKIES]: { name: "Cookies", family: "reward", weight: -4 },
  [CellLabel.CANDY]: { name: "Candy", family: "reward", weight: -2 },
  [CellLabel.CHOCOLATE]: { name: "Chocolate", family: "reward", weight: -6 },
  [CellLabel.ZOMBIE]: { name: "Zombie", family: "danger", weight: 7 },
  [CellLabel.GHOST]: { name: "Ghost", family: "danger", weight: 6 },
  [CellLabel.WITCH]: { name: "Witch", family: "danger", weight: 9 },
  [CellLabel.FOG]: { name: "Fog", family: "danger", weight: 3 },
  [CellLabel.SHADOWS]: { name: "Shadows", family: "danger", weight: 4 },
  [CellLabel.CROW]: { name: "Crow", family: "danger", weight: 5 },
  [CellLabel.BLACK_CAT]: { name: "Black Cat", family: "danger", weight: 2 },
  [CellLabel.SKELETON]: { name: "Skeleton", family: "danger", weight: 5 },
  [CellLabel.SPIDER]: { name: "Spider", family: "danger", weight: 3 },
  [CellLabel.BAT]: { name: "Bat", family: "danger", weight: 1 },
  [CellLabel.PUMPKIN]: { name: "Pumpkin", family: "danger", weight: 2 },
} as const satisfies Record<CellLabel, CellLabelInfo>;

export type CellWeight<L extends CellLabel> = (typeof CELL_LABEL_INFO)[L]["weight"];

type LabelsOfFamily<F extends CellFamily> = {
  [L in CellLabel]: (typeof CELL_LABEL_INFO)[L]["family"] extends F ? L : never;
}[CellLabel];

export type StructuralLabel = LabelsOfFamily<"structural">;
export type RewardLabel = LabelsOfFamily<"reward">;
export type DangerLabel = LabelsOfFamily<"danger">;
export type ArtifactLabel = RewardLabel | DangerLabel;

export const REWARD_LABELS = [
  CellLabel.MARSHMALLOWS,
  CellLabel.GUMMY_BEARS,
  CellLabel.COOKIES,
  CellLabel.CANDY,
  CellLabel.CHOCOLATE,
] as const satisfies readonly RewardLabel[];

export const DANGER_LABELS = [
  CellLabel.ZOMBIE,
  CellLabel.GHOST,
  CellLabel.WITCH,
  CellLabel.FOG,
  CellLabel.SHADOWS,
  CellLabel.CROW,
  CellLabel.BLACK_CAT,
  CellLabel.SKELETON,
  CellLabel.SPIDER,
  CellLabel.BAT,
  CellLabel.PUMPKIN,
] as const satisfies readonly DangerLabel[];

const CELL_LABEL_COUNT = Object.keys(CELL_LABEL_INFO).length;

export function isCellLabel(value: number): value is CellLabel {
  return Number.isInteger(value) && value >= 0 && value < CELL_LABEL_COUNT;
}

export function cellWeight<L extends CellLabel>(label: L): CellWeight<L> {
  return CELL_LABEL_INFO[label].weight;
}

export function cellName(label: CellLabel): string {
  return CELL_LABEL_INFO[label].name;
}

export function cellFamily(label: CellLabel): CellFamily {
  return CELL_LABEL_INFO[label].family;
}

/**
 * Every label except `WALL` can be walked on.
 */
export function isTraversable(label: CellLabel): boolean {
  return label !== CellLabel.WALL;
}

export function isReward(label: CellLabel): label is RewardLabel {
  return cellFamily(label) === "reward";
}

export function isDanger(label: CellLabel): label is DangerLabel {
  return cellFamily(label) === "danger";
}

export function isArtifact(label: CellLabel): label is ArtifactLabel {
  return cellFamily(label) !== "structural";
}
