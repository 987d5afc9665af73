/**
 * The one place help and chord feedback is written to.
 */
export interface StatusSurface {
  write(text: string): void;
}

type StatusCell = {
  read(): string;
  commit(text: string): void;
  onError?: (err: unknown) => void;
};

/**
 * Status surface backed by a store field. Writing the text already shown is
 * a no-op; a failing commit goes to `onError` and never reaches the caller.
 */
export function createStatusSurface(cell: StatusCell): StatusSurface {
  return {
    write(text) {
      if (cell.read() === text) {
        return;
      }
      try {
        cell.commit(text);
      } catch (err) {
        cell.onError?.(err);
      }
    },
  };
}
