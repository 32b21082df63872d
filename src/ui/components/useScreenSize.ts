import { useEffect, useState } from "react";
import { useStdout } from "ink";
import { DEFAULT_SIZE, type ScreenSize } from "../layout.js";

/**
 * Size of the output stream, updated on resize
 */
export function useScreenSize(): ScreenSize {
  const { stdout } = useStdout();
  const [size, setSize] = useState<ScreenSize>(() => ({
    columns: stdout.columns || DEFAULT_SIZE.columns,
    rows: stdout.rows || DEFAULT_SIZE.rows,
  }));

  useEffect(() => {
    const onResize = (): void => {
      setSize({
        columns: stdout.columns || DEFAULT_SIZE.columns,
        rows: stdout.rows || DEFAULT_SIZE.rows,
      });
    };
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  return size;
}
