type TextBlock = { type: "text"; text: string };

const isTextBlock = (block: unknown): block is TextBlock =>
  typeof block === "object" &&
  block !== null &&
  "type" in block &&
  block.type === "text" &&
  "text" in block &&
  typeof block.text === "string";

/** Text blocks of a tool result, in order. */
export const extractTextBlocks = (result: unknown): string[] => {
  if (typeof result !== "object" || result === null) {
    return [];
  }

  if ("content" in result && Array.isArray(result.content)) {
    const blocks: unknown[] = result.content;
    return blocks.filter(isTextBlock).map((block) => block.text);
  }

  if ("toolResult" in result && result.toolResult !== undefined) {
    return [JSON.stringify(result.toolResult, null, 2)];
  }

  return [];
};

export const isErrorResult = (result: unknown) =>
  typeof result === "object" &&
  result !== null &&
  "isError" in result &&
  result.isError === true;
