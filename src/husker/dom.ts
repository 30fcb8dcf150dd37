import {
  ATTRIBUTE_NODE,
  CDATA_SECTION_NODE,
  COMMENT_NODE,
  DOCUMENT_NODE,
  ELEMENT_NODE,
  PROCESSING_INSTRUCTION_NODE,
  TEXT_NODE,
} from '../constants.js';

export function isDomNode(value: unknown): value is Node {
  return (
    typeof value === 'object' &&
    value !== null &&
    'nodeType' in value &&
    typeof value.nodeType === 'number' &&
    'nodeName' in value
  );
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isDocument(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

export function isAttr(node: Node): node is Attr {
  return node.nodeType === ATTRIBUTE_NODE;
}

/**
 * Text and CDATA nodes: the ones that make up an element's text content
 */
export function isTextLike(node: Node): node is CharacterData {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

export function isCharacterData(node: Node): node is CharacterData {
  return isTextLike(node) || node.nodeType === COMMENT_NODE || node.nodeType === PROCESSING_INSTRUCTION_NODE;
}

export function isHtmlDocument(node: Node): boolean {
  const document = isDocument(node) ? node : node.ownerDocument;
  return document !== null && document.contentType === 'text/html';
}
