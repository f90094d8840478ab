export function truncateMiddle(text: string | undefined | null, limit: number): string {
  if (!text || text.length <= limit) return text ?? "";

  const startLength = Math.floor(limit * 0.6);
  const endLength = limit - startLength - 5;

  const start = text.slice(0, startLength);
  const end = text.slice(-endLength);
  return `${start} ... ${end}`;
}

/**
 * Remove `//` and `/* *\/` comments from JSON text, leaving string literals alone.
 */
export function stripJsonComments(text: string): string {
  let out = "";
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    const next = text.charAt(i + 1);

    if (inString) {
      out += char;
      if (char === "\\") {
        out += next;
        i += 2;
        continue;
      }
      if (char === "\"") inString = false;
      i++;
      continue;
    }

    if (char === "\"") {
      inString = true;
      out += char;
      i++;
    } else if (char === "/" && next === "/") {
      while (i < text.length && text.charAt(i) !== "\n") i++;
    } else if (char === "/" && next === "*") {
      const close = text.indexOf("*/", i + 2);
      i = close < 0 ? text.length : close + 2;
      out += " ";
    } else {
      out += char;
      i++;
    }
  }

  return out;
}
