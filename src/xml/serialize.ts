import type { XmlElementNode, XmlNode } from "./element.js";

const TEXT_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
  "\t": "&#9;",
  "\n": "&#10;",
  "\r": "&#13;",
};

const TEXT_ESCAPE_RE = /[&<>]/g;
const ATTRIBUTE_ESCAPE_RE = /[&<>"'\t\n\r]/g;

export const escapeText = (text: string): string => {
  return text.replace(TEXT_ESCAPE_RE, (char) => TEXT_ESCAPES[char] ?? char);
};

export const escapeAttributeValue = (value: string): string => {
  return value.replace(ATTRIBUTE_ESCAPE_RE, (char) => ATTRIBUTE_ESCAPES[char] ?? char);
};

const serializeAttributes = (attributes: Record<string, string>): string => {
  let result = "";
  for (const [name, value] of Object.entries(attributes)) {
    result += ` ${name}="${escapeAttributeValue(value)}"`;
  }
  return result;
};

const serializeNode = (node: XmlNode): string => {
  if (node.kind === "text") {
    return escapeText(node.value);
  }
  return serializeElement(node);
};

export const serializeOpenTag = (element: XmlElementNode): string => {
  return `<${element.name}${serializeAttributes(element.attributes)}>`;
};

export const serializeCloseTag = (element: XmlElementNode): string => {
  return `</${element.name}>`;
};

export const serializeElement = (element: XmlElementNode): string => {
  if (element.children.length === 0) {
    return `<${element.name}${serializeAttributes(element.attributes)}/>`;
  }
  const content = element.children.map(serializeNode).join("");
  return `${serializeOpenTag(element)}${content}${serializeCloseTag(element)}`;
};
