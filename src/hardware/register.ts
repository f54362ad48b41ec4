export enum Register {
  R_R0,
  R_R1,
  R_R2,
  R_R3,
  R_R4,
  R_R5,
  R_R6,
  R_R7,
  R_COUNT,
}

export enum ConditionFlag {
  FL_POS = 1 << 0 /* P */,
  FL_ZRO = 1 << 1 /* Z */,
  FL_NEG = 1 << 2 /* N */,
}

export type ConditionTag = 'N' | 'Z' | 'P';

export function conditionTag(flag: ConditionFlag): ConditionTag {
  switch (flag) {
    case ConditionFlag.FL_NEG:
      return 'N';
    case ConditionFlag.FL_ZRO:
      return 'Z';
    case ConditionFlag.FL_POS:
      return 'P';
  }
}
