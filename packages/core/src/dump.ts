import { inspect } from "node:util";
import { dedent } from "ts-dedent";
import type {
  SelectableSequence,
} from "./SelectableSequence.js";

export type DumpOptions<A, B> = {
  showUnselected?: (item: A) => string;
  showSelected?: (item: B) => string;
};

const show = (value: unknown) =>
  inspect(value, { depth: null, colors: false });

export const dump = <A, B>(
  seq: SelectableSequence<A, B>,
  {
    showUnselected = show,
    showSelected = show,
  }: DumpOptions<A, B> = {},
) => {
  const list = (items: readonly A[]) =>
    `[${items
      .map((item) => showUnselected(item))
      .join(", ")}]`;
  const selection = seq.selection.some
    ? showSelected(seq.selection.value)
    : "<none>";
  return dedent`
    prefix: ${list(seq.prefix)}
    selection: ${selection}
    suffix: ${list(seq.suffix)}
  `;
};
