/**
 * Page-side functions. Each is evaluated through `callPageFunction`, so the
 * only input they ever see is their JSON argument.
 */

export type ItemLocator = {
  index: number;
  containerSelector: string;
  itemSelector: string;
};

export type ExtractItemArgs = ItemLocator & {
  linkAttribute: string;
};

export type HighlightItemArgs = ItemLocator & {
  color: string;
};

export type AnnounceArgs = {
  prefix: string;
  message: string;
};

export const EXTRACT_ITEM_FUNCTION = `(args) => {
  const container = document.querySelector(args.containerSelector);
  if (!container) return { status: "waiting_for_container" };
  const items = container.querySelectorAll(args.itemSelector);
  if (items.length === 0) return { status: "waiting_for_item" };
  if (args.index >= items.length) return { status: "out_of_range", available: items.length };
  const item = items[args.index];
  item.scrollIntoView({ block: "center", inline: "nearest" });
  const image = item.querySelector("img");
  const anchor = item.querySelector("a[href]");
  const attributeLink = args.linkAttribute ? item.getAttribute(args.linkAttribute) : null;
  const rect = item.getBoundingClientRect();
  const parent = item.parentElement;
  return {
    status: "ok",
    index: args.index,
    available: items.length,
    fields: {
      link: attributeLink || (anchor ? anchor.href : "") || null,
      imageUrl: image ? image.currentSrc || image.src || null : null,
      alt: image ? image.alt || null : null,
      title: item.getAttribute("title") || (anchor ? anchor.title : "") || null,
      text: (item.innerText || "").trim().slice(0, 500),
    },
    bounds: { x: rect.left, y: rect.top, width: rect.width, height: rect.height },
    tagName: item.tagName,
    parentTag: parent ? parent.tagName : null,
    childCount: parent ? parent.children.length : 0,
  };
}`;

export const HOVER_ITEM_FUNCTION = `(args) => {
  const container = document.querySelector(args.containerSelector);
  const item = container ? container.querySelectorAll(args.itemSelector)[args.index] : undefined;
  if (!item) return { dispatched: false };
  const rect = item.getBoundingClientRect();
  const init = {
    bubbles: true,
    cancelable: true,
    view: window,
    clientX: rect.left + rect.width / 2,
    clientY: rect.top + rect.height / 2,
  };
  item.dispatchEvent(new MouseEvent("mouseover", init));
  item.dispatchEvent(new MouseEvent("mouseenter", { ...init, bubbles: false }));
  item.dispatchEvent(new MouseEvent("mousemove", init));
  return { dispatched: true };
}`;

export const HIGHLIGHT_ITEM_FUNCTION = `(args) => {
  const container = document.querySelector(args.containerSelector);
  const item = container ? container.querySelectorAll(args.itemSelector)[args.index] : undefined;
  if (!item) return false;
  item.style.outline = "3px solid " + args.color;
  item.style.outlineOffset = "-3px";
  return true;
}`;

export const ANNOUNCE_FUNCTION = `(args) => {
  console.log(args.prefix, args.message);
  const previousTitle = document.title || "";
  const newTitle = args.prefix + " " + args.message;
  document.title = newTitle;
  return { previousTitle, newTitle };
}`;
