// Non domain types

export type Clock = {
  readonly now: () => Date;
};
