// AA tree levels: leaves sit at 1, an absent child counts as 0
export const LEAF_LEVEL = 1;
export const NULL_LEVEL = 0;
