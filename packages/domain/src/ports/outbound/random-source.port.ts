export interface RandomSourcePort {
  /** Returns a float uniform on [0, 1). */
  next(): number;
}
