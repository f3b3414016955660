import { viewOf, type EntriesView } from "../core/containers";
import { UnsupportedContainerError } from "../core/errors";

// Multi-entry accessors only understand records, Maps and keyword lists.
export function requireView(data: unknown, accessor: string): EntriesView {
  const view = viewOf(data);
  if (!view) {
    throw new UnsupportedContainerError(
      data,
      accessor,
      "expected a record, a Map or a keyword list",
    );
  }
  return view;
}
