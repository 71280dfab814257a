export interface XmlTextNode {
  kind: "text";
  value: string;
}

export interface XmlElementNode {
  kind: "element";
  /** Qualified name as written, prefix included. */
  name: string;
  uri: string | null;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElementNode | XmlTextNode;

export const createElement = (
  name: string,
  attributes: Record<string, string> = {},
  uri: string | null = null
): XmlElementNode => {
  return {
    kind: "element",
    name,
    uri,
    attributes: { ...attributes },
    children: [],
  };
};

export const appendChild = (parent: XmlElementNode, child: XmlElementNode): XmlElementNode => {
  parent.children.push(child);
  return child;
};

/**
 * Appends character data, extending the last child when it is already text so
 * that the resulting tree is the same however the input was chunked.
 */
export const appendText = (parent: XmlElementNode, value: string): void => {
  if (value.length === 0) {
    return;
  }
  const last = parent.children[parent.children.length - 1];
  if (last && last.kind === "text") {
    last.value += value;
    return;
  }
  parent.children.push({ kind: "text", value });
};

export const isXmlElement = (value: unknown): value is XmlElementNode => {
  if (value === null || typeof value !== "object") {
    return false;
  }
  return "kind" in value && value.kind === "element" && "name" in value && typeof value.name === "string";
};

export const elementText = (element: XmlElementNode): string => {
  let text = "";
  for (const child of element.children) {
    if (child.kind === "text") {
      text += child.value;
    }
  }
  return text;
};

export const childElements = (element: XmlElementNode): XmlElementNode[] => {
  return element.children.filter((child): child is XmlElementNode => child.kind === "element");
};
