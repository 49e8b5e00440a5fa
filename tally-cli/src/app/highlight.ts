import type { Token } from "tally-main";

export type TokenColor = "cyan" | "magenta" | "blue" | "red" | "gray";

export type StyledRun = {
  readonly text: string;
  readonly color?: TokenColor;
  readonly inverse?: boolean;
};

export function tokenColor(token: Token, next: Token | undefined): TokenColor | undefined {
  switch (token.type) {
    case "PLUS":
    case "MINUS":
    case "STAR":
    case "SLASH":
    case "CARET":
      return "cyan";
    case "NUMBER":
      return "magenta";
    case "IDENT":
      return next?.type === "LPAREN" ? "blue" : "red";
    case "LPAREN":
    case "RPAREN":
      return "gray";
    default:
      return undefined;
  }
}

/**
 * Splits `input` into runs of equal style. Characters outside any token
 * (spaces) are unstyled; the character under `cursor`, or a trailing space
 * when the cursor sits at the end, is drawn inverted.
 */
export function styleRuns(input: string, tokens: readonly Token[], cursor?: number): StyledRun[] {
  const colors: (TokenColor | undefined)[] = new Array<TokenColor | undefined>(input.length).fill(undefined);
  tokens.forEach((token, i) => {
    const color = tokenColor(token, tokens[i + 1]);
    for (let pos = token.start; pos < token.end && pos < input.length; pos++) {
      colors[pos] = color;
    }
  });

  const text = cursor === input.length ? `${input} ` : input;
  const runs: StyledRun[] = [];
  let current: { text: string; color?: TokenColor; inverse: boolean } | undefined;

  for (let pos = 0; pos < text.length; pos++) {
    const color = colors[pos];
    const inverse = pos === cursor;
    if (current && current.color === color && current.inverse === inverse) {
      current.text += text.charAt(pos);
      continue;
    }
    if (current) runs.push(toRun(current));
    current = { text: text.charAt(pos), color, inverse };
  }
  if (current) runs.push(toRun(current));

  return runs;
}

function toRun(run: { text: string; color?: TokenColor; inverse: boolean }): StyledRun {
  return {
    text: run.text,
    ...(run.color ? { color: run.color } : {}),
    ...(run.inverse ? { inverse: true } : {}),
  };
}
