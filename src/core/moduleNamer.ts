export const PYTHON_EXTENSIONS = [".py", ".pyi", ".pyw"];

/**
 * Bare module name for a file path: `a/b/widget.py` and `a\b\widget.py`
 * both give `widget`, whatever platform we run on.
 */
export function deriveModuleName(
  filePath: string,
  extensions: readonly string[] = PYTHON_EXTENSIONS
): string {
  const ext = extensions.find((e) => filePath.endsWith(e));
  const stem = ext ? filePath.slice(0, -ext.length) : filePath;
  const segments = stem.split(/[\\/]/);
  const last = segments[segments.length - 1];

  return last ? last : stem.replace(/[\\/]/g, ".");
}
