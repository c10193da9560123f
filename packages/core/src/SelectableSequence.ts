import { raise } from "@selectable/shared/raise";
import {
  type Option,
  type Result,
  fail,
  mapOption,
  none,
  ok,
  some,
} from "@selectable/shared/types";
import { isEqual } from "lodash-es";
import { safeParse } from "valibot";
import {
  IndexOutOfRangeError,
  NoMatchError,
} from "./errors.js";
import { indexSchema } from "./schema.js";

/**
 * An ordered sequence with at most one selected element.
 *
 * Unselected items are of type `A`, the selected one of type `B`, so the
 * selection can carry richer state than the rest (an edit form for the
 * active row, for instance). The logical order is
 * `prefix ++ [selection] ++ suffix`.
 */
export type SelectableSequence<A, B> = {
  readonly prefix: readonly A[];
  readonly selection: Option<B>;
  readonly suffix: readonly A[];
};

const identity = <T>(value: T) => value;

export const empty = <A, B>(): SelectableSequence<
  A,
  B
> => ({
  prefix: [],
  selection: none(),
  suffix: [],
});

export const singleton = <A, B>(
  value: B,
): SelectableSequence<A, B> => ({
  prefix: [],
  selection: some(value),
  suffix: [],
});

export const fromSequence = <A, B>(
  items: readonly A[],
): SelectableSequence<A, B> => ({
  prefix: [...items],
  selection: none(),
  suffix: [],
});

export const selected = <A, B>(
  seq: SelectableSequence<A, B>,
): Option<B> => seq.selection;

/** Position of the selection in the flattened order. */
export const selectedIndex = <A, B>(
  seq: SelectableSequence<A, B>,
): Option<number> =>
  mapOption(seq.selection, () => seq.prefix.length);

export const length = <A, B>(
  seq: SelectableSequence<A, B>,
): number =>
  seq.prefix.length +
  (seq.selection.some ? 1 : 0) +
  seq.suffix.length;

export const equals = <A, B>(
  a: SelectableSequence<A, B>,
  b: SelectableSequence<A, B>,
): boolean => isEqual(a, b);

export const toSequence = <A, B, C>(
  seq: SelectableSequence<A, B>,
  unselectedMap: (item: A) => C,
  selectedMap: (item: B) => C,
): C[] => {
  const result = seq.prefix.map((item) =>
    unselectedMap(item),
  );
  if (seq.selection.some) {
    result.push(selectedMap(seq.selection.value));
  }
  for (const item of seq.suffix) {
    result.push(unselectedMap(item));
  }
  return result;
};

export const flatten = <A>(
  seq: SelectableSequence<A, A>,
): A[] => toSequence(seq, identity, identity);

export const map = <A, B, C, D>(
  unselectedFn: (item: A) => C,
  selectedFn: (item: B) => D,
  seq: SelectableSequence<A, B>,
): SelectableSequence<C, D> => ({
  prefix: seq.prefix.map((item) => unselectedFn(item)),
  selection: mapOption(seq.selection, selectedFn),
  suffix: seq.suffix.map((item) => unselectedFn(item)),
});

/**
 * Like {@link map}, but both functions also receive the element's index in
 * the flattened order.
 */
export const indexedMap = <A, B, C, D>(
  unselectedFn: (index: number, item: A) => C,
  selectedFn: (index: number, item: B) => D,
  seq: SelectableSequence<A, B>,
): SelectableSequence<C, D> => {
  const selectionIndex = seq.prefix.length;
  const suffixOffset =
    selectionIndex + (seq.selection.some ? 1 : 0);
  return {
    prefix: seq.prefix.map((item, index) =>
      unselectedFn(index, item),
    ),
    selection: mapOption(seq.selection, (item) =>
      selectedFn(selectionIndex, item),
    ),
    suffix: seq.suffix.map((item, index) =>
      unselectedFn(suffixOffset + index, item),
    ),
  };
};

export const updateSelected = <A, B>(
  fn: (item: B) => B,
  seq: SelectableSequence<A, B>,
): SelectableSequence<A, B> =>
  seq.selection.some
    ? { ...seq, selection: some(fn(seq.selection.value)) }
    : seq;

const splitAt = <A, B>(
  items: readonly A[],
  index: number,
  project: (item: A) => B,
): SelectableSequence<A, B> => {
  const prefix: A[] = [];
  const suffix: A[] = [];
  let selection: Option<B> = none();
  for (const [position, item] of items.entries()) {
    if (position < index) {
      prefix.push(item);
    } else if (position === index) {
      selection = some(project(item));
    } else {
      suffix.push(item);
    }
  }
  return { prefix, selection, suffix };
};

/**
 * Moves the selection to `index` of the flattened order.
 *
 * The current selection, if any, is demoted with `reconstruct` first, then
 * the element at `index` is promoted with `project`. An index that is not
 * an integer in `[0, length)` yields an {@link IndexOutOfRangeError} and
 * calls neither function.
 */
export const select = <A, B>(
  reconstruct: (item: B) => A,
  project: (item: A) => B,
  index: number,
  seq: SelectableSequence<A, B>,
): Result<
  SelectableSequence<A, B>,
  IndexOutOfRangeError
> => {
  const total = length(seq);
  if (!safeParse(indexSchema(total), index).success) {
    return fail(new IndexOutOfRangeError(index, total));
  }
  return ok(
    splitAt(
      toSequence(seq, identity, reconstruct),
      index,
      project,
    ),
  );
};

export const selectOrThrow = <A, B>(
  reconstruct: (item: B) => A,
  project: (item: A) => B,
  index: number,
  seq: SelectableSequence<A, B>,
): SelectableSequence<A, B> => {
  const result = select(
    reconstruct,
    project,
    index,
    seq,
  );
  return result.ok ? result.value : raise(result.error);
};

/**
 * Selects the first element, in flattened order, that satisfies
 * `predicate`. The predicate sees the current selection in its demoted form.
 */
export const selectWhere = <A, B>(
  reconstruct: (item: B) => A,
  project: (item: A) => B,
  predicate: (item: A, index: number) => boolean,
  seq: SelectableSequence<A, B>,
): Result<SelectableSequence<A, B>, NoMatchError> => {
  const items = toSequence(seq, identity, reconstruct);
  const index = items.findIndex((item, position) =>
    predicate(item, position),
  );
  if (index === -1) {
    return fail(new NoMatchError(items.length));
  }
  return ok(splitAt(items, index, project));
};

export const unselect = <A, B>(
  reconstruct: (item: B) => A,
  seq: SelectableSequence<A, B>,
): SelectableSequence<A, B> => {
  if (!seq.selection.some) {
    return seq;
  }
  return {
    prefix: seq.prefix,
    selection: none(),
    suffix: [
      reconstruct(seq.selection.value),
      ...seq.suffix,
    ],
  };
};
