// Expressions evaluated in the page through Runtime.evaluate. Every argument is
// embedded with JSON.stringify; element lookups report `found: false` instead of throwing.

export type SelectBy = "value" | "text" | "index";

const literal = (value: string | number): string => JSON.stringify(value);

export const selectorExistsScript = (selector: string): string => {
  return `document.querySelector(${literal(selector)}) !== null`;
};

export const predicateScript = (expression: string): string => {
  return `Boolean(${expression})`;
};

/**
 * Sets the value through the prototype's native setter so framework-managed
 * inputs observe the change, then fires `input` and `change`.
 */
export const fillScript = (selector: string, text: string): string => `(() => {
  const el = document.querySelector(${literal(selector)});
  if (!el) return { found: false };
  if (typeof el.focus === "function") el.focus();
  const proto = el instanceof HTMLTextAreaElement
    ? HTMLTextAreaElement.prototype
    : el instanceof HTMLSelectElement
      ? HTMLSelectElement.prototype
      : HTMLInputElement.prototype;
  const descriptor = Object.getOwnPropertyDescriptor(proto, "value");
  if (descriptor && descriptor.set && "value" in el) {
    descriptor.set.call(el, ${literal(text)});
  } else if (el.isContentEditable) {
    el.textContent = ${literal(text)};
  } else {
    el.value = ${literal(text)};
  }
  el.dispatchEvent(new Event("input", { bubbles: true }));
  el.dispatchEvent(new Event("change", { bubbles: true }));
  return { found: true, value: "value" in el ? String(el.value) : (el.textContent || "") };
})()`;

export const textScript = (selector: string): string => `(() => {
  const el = document.querySelector(${literal(selector)});
  if (!el) return { found: false };
  return { found: true, value: (el.innerText ?? el.textContent ?? "").trim() };
})()`;

export const attributeScript = (selector: string, name: string): string => `(() => {
  const el = document.querySelector(${literal(selector)});
  if (!el) return { found: false };
  return { found: true, value: el.getAttribute(${literal(name)}) };
})()`;

export const selectScript = (selector: string, value: string, by: SelectBy): string => `(() => {
  const el = document.querySelector(${literal(selector)});
  if (!el) return { found: false };
  if (!(el instanceof HTMLSelectElement)) return { found: true, matched: false, reason: "not a <select> element" };
  const options = Array.from(el.options);
  const wanted = ${literal(value)};
  const by = ${literal(by)};
  const index = by === "index"
    ? Number.parseInt(wanted, 10)
    : options.findIndex((option) => by === "text" ? option.text.trim() === wanted.trim() : option.value === wanted);
  if (!(index >= 0 && index < options.length)) return { found: true, matched: false, reason: "no matching option" };
  el.selectedIndex = index;
  el.dispatchEvent(new Event("input", { bubbles: true }));
  el.dispatchEvent(new Event("change", { bubbles: true }));
  return { found: true, matched: true, value: el.value };
})()`;

export const scrollIntoViewScript = (selector: string): string => `(() => {
  const el = document.querySelector(${literal(selector)});
  if (!el) return { found: false };
  el.scrollIntoView({ block: "center", inline: "center" });
  return { found: true };
})()`;

export const pageInfoScript = `({
  title: document.title,
  url: location.href,
  readyState: document.readyState
})`;

export const pageTextScript = (maxChars: number): string => {
  return `(document.body ? document.body.innerText : "").slice(0, ${literal(maxChars)})`;
};

/** Lists outgoing hrefs: resolved anchor targets and form actions. */
export const linksScript = `(() => {
  const hrefs = [];
  for (const anchor of Array.from(document.querySelectorAll("a[href]"))) {
    hrefs.push(anchor.href);
  }
  for (const form of Array.from(document.querySelectorAll("form"))) {
    const action = form.getAttribute("action");
    hrefs.push(action ? new URL(action, document.baseURI).href : location.href);
  }
  return { title: document.title, url: location.href, links: hrefs };
})()`;

/**
 * Visible elements whose own text contains `text` (case-insensitive), exact
 * matches first, each with a suggested selector and its centre point.
 */
export const findByTextScript = (text: string, limit: number): string => `(() => {
  const needle = ${literal(text)}.trim().toLowerCase();
  const limit = ${literal(limit)};
  const clickable = "a, button, [role='button'], [onclick], input[type='button'], input[type='submit']";
  const visible = (el) => {
    const rect = el.getBoundingClientRect();
    const style = getComputedStyle(el);
    return rect.width > 0 && rect.height > 0 && style.visibility !== "hidden" && style.display !== "none";
  };
  const ownText = (el) => Array.from(el.childNodes)
    .filter((node) => node.nodeType === Node.TEXT_NODE)
    .map((node) => node.textContent || "")
    .join(" ")
    .replace(/\\s+/g, " ")
    .trim();
  const selectorFor = (el) => {
    if (el.id) return "#" + CSS.escape(el.id);
    const testId = el.getAttribute("data-testid");
    if (testId) return "[data-testid=" + JSON.stringify(testId) + "]";
    const name = el.getAttribute("name");
    if (name) return el.tagName.toLowerCase() + "[name=" + JSON.stringify(name) + "]";
    const parts = [];
    let node = el;
    while (node && node.nodeType === Node.ELEMENT_NODE && node !== document.documentElement) {
      const parent = node.parentElement;
      const tag = node.tagName.toLowerCase();
      if (!parent) { parts.unshift(tag); break; }
      const siblings = Array.from(parent.children).filter((child) => child.tagName === node.tagName);
      parts.unshift(siblings.length > 1 ? tag + ":nth-of-type(" + (siblings.indexOf(node) + 1) + ")" : tag);
      node = parent;
    }
    return parts.join(" > ");
  };
  const seen = new Set();
  const matches = [];
  const consider = (el, label) => {
    if (seen.has(el) || !visible(el)) return;
    const lowered = label.toLowerCase();
    if (!lowered.includes(needle)) return;
    seen.add(el);
    const rect = el.getBoundingClientRect();
    matches.push({
      match: lowered === needle ? "exact" : "contains",
      tag: el.tagName.toLowerCase(),
      text: label.slice(0, 200),
      selector: selectorFor(el),
      x: Math.round(rect.left + rect.width / 2),
      y: Math.round(rect.top + rect.height / 2)
    });
  };
  if (needle) {
    for (const el of Array.from(document.querySelectorAll("body *"))) consider(el, ownText(el));
    for (const el of Array.from(document.querySelectorAll(clickable))) consider(el, (el.innerText || el.value || "").trim());
  }
  matches.sort((a, b) => (a.match === b.match ? 0 : a.match === "exact" ? -1 : 1));
  return matches.slice(0, limit);
})()`;
