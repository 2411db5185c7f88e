/**
 * In-page collection of raw field values
 */

import type { FieldRule } from '../types/index.js';
import type { RawItem } from './types.js';

/**
 * What the in-page collector needs; plain data so it can cross into the page
 */
export interface CollectPlan {
  /** null collects a single item from the whole document */
  itemSelector: string | null;
  labelSelector: string;
  fields: Array<{ name: string; selector: string | null; label: string | null; attribute: string | null }>;
  detailLinkSelector: string | null;
  blockSelector: string | null;
}

export interface CollectOutput {
  items: RawItem[];
  blocks: string[];
}

export function toCollectFields(fields: Record<string, FieldRule>): CollectPlan['fields'] {
  return Object.entries(fields).map(([name, rule]) => ({
    name,
    selector: rule.selector ?? null,
    label: rule.label ?? null,
    attribute: rule.attribute ?? null,
  }));
}

/**
 * Runs inside the page. Keep it free of references to module scope and of
 * named inner functions: it is serialized as source text.
 */
export function collectInPage(plan: CollectPlan): CollectOutput {
  const roots: Element[] = plan.itemSelector
    ? Array.from(document.querySelectorAll(plan.itemSelector))
    : [document.documentElement];

  const items = roots.map((root, index) => {
    const values: Record<string, string | null> = {};

    for (const field of plan.fields) {
      let element: Element | null = null;

      if (field.label) {
        const wanted = field.label.trim().toLowerCase();
        const labels = Array.from(root.querySelectorAll(plan.labelSelector));
        const label = labels.find((el) => (el.textContent ?? '').trim().toLowerCase() === wanted);
        element = label ? label.nextElementSibling : null;
      } else {
        element = field.selector ? root.querySelector(field.selector) : root;
      }

      if (!element) {
        values[field.name] = null;
      } else if (field.attribute) {
        const raw = element.getAttribute(field.attribute);
        values[field.name] =
          raw && (field.attribute === 'href' || field.attribute === 'src')
            ? new URL(raw, document.baseURI).href
            : raw;
      } else {
        values[field.name] =
          element instanceof HTMLElement ? element.innerText : element.textContent;
      }
    }

    let detailUrl: string | null = null;
    if (plan.detailLinkSelector) {
      const href = root.querySelector(plan.detailLinkSelector)?.getAttribute('href');
      if (href && !href.trim().toLowerCase().startsWith('javascript:')) {
        detailUrl = new URL(href, document.baseURI).href;
      }
    }

    return { index, values, detailUrl };
  });

  const blocks = plan.blockSelector
    ? Array.from(document.querySelectorAll(plan.blockSelector)).map((el) =>
        el instanceof HTMLElement ? el.innerText : el.textContent ?? ''
      )
    : [];

  return { items, blocks };
}
