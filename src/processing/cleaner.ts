// src/processing/cleaner.ts
import { isSkipped, type SkipSet } from './tag-filter.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

// One open element during the walk: its children and the cleaned pieces gathered so far
interface Frame {
  tag: string;
  children: Node[];
  next: number;
  parts: string[];
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function openFrame(element: Element): Frame {
  return {
    tag: element.localName,
    children: Array.from(element.childNodes),
    next: 0,
    parts: [],
  };
}

function closeFrame(frame: Frame): string {
  const inner = frame.parts.join(' ').trim();
  if (!inner) {
    return '';
  }
  return `<${frame.tag}>${inner}</${frame.tag}>`;
}

/**
 * Rebuilds `element` as bare HTML, dropping skipped subtrees, attributes, comments
 * and every element left without text. Returns '' when nothing survives.
 *
 * The walk keeps its own stack instead of recursing, so document depth is bounded
 * by memory rather than by the call stack.
 */
export function cleanElement(element: Element, skipSet: SkipSet): string {
  if (isSkipped(element.localName, skipSet)) {
    return '';
  }

  const stack: Frame[] = [openFrame(element)];
  let result = '';

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.children.length) {
      const child = frame.children[frame.next];
      frame.next += 1;

      if (isElement(child)) {
        if (!isSkipped(child.localName, skipSet)) {
          stack.push(openFrame(child));
        }
      } else if (isText(child)) {
        const text = child.data.trim();
        if (text) {
          frame.parts.push(escapeText(text));
        }
      }
      continue;
    }

    stack.pop();
    const cleaned = closeFrame(frame);
    const parent: Frame | undefined = stack[stack.length - 1];
    if (parent) {
      if (cleaned) parent.parts.push(cleaned);
    } else {
      result = cleaned;
    }
  }

  return result;
}
