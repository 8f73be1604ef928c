import { afterEach, describe, expect, it, vi } from "vitest";
import { DOMImplementation, DOMParser } from "@xmldom/xmldom";
import { SvgElement } from "../src/element/element";
import { SvgPathElement } from "../src/element/pathElement";
import { serializeElement, SVG_NAMESPACE, XLINK_NAMESPACE } from "../src/element/markup";
import { Style } from "../src/attributes/style";
import { TransformList } from "../src/attributes/transformList";
import { TransformParseError } from "../src/errors";

function parseRoot(text: string): Element {
  return new DOMParser().parseFromString(text, "image/svg+xml").documentElement;
}

function newDocument() {
  return new DOMImplementation().createDocument(null, null, null);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("readMarkup", () => {
  it("stores attributes as raw text in document order", () => {
    const el = new SvgElement("rect");
    el.readMarkup(parseRoot('<rect width="10" height="5" id="r"/>'));
    expect(el.attributes.keys()).toEqual(["width", "height", "id"]);
    expect(el.attributes.get("width")).toBe("10");
    expect(el.id).toBe("r");
  });

  it("parses style and transform eagerly", () => {
    const el = new SvgElement("rect");
    el.readMarkup(parseRoot('<rect style="fill:red; stroke: blue" transform="translate(1, 2)"/>'));
    const style = el.attributes.get("style");
    expect(style).toBeInstanceOf(Style);
    expect(String(style)).toBe("fill:red;stroke:blue");
    expect(el.attributes.get("transform")).toBeInstanceOf(TransformList);
    expect(el.transform.toString()).toBe("translate(1,2)");
  });

  it("keeps prefixed names as written", () => {
    const el = new SvgElement("use");
    el.readMarkup(parseRoot('<use xmlns:xlink="http://www.w3.org/1999/xlink" xlink:href="#shape"/>'));
    expect(el.attributes.get("xlink:href")).toBe("#shape");
  });

  it("passes transform grammar errors through", () => {
    const el = new SvgElement("g");
    expect(() => el.readMarkup(parseRoot('<g transform="spin(4)"/>'))).toThrow(TransformParseError);
  });
});

describe("writeMarkup", () => {
  it("becomes the document root when there is no parent", () => {
    const doc = newDocument();
    const node = new SvgElement("rect").setAttribute("width", "10").writeMarkup(doc, null);
    expect(doc.documentElement).toBe(node);
    expect(node.namespaceURI).toBe(SVG_NAMESPACE);
    expect(node.nodeName).toBe("rect");
    expect(node.getAttribute("width")).toBe("10");
  });

  it("appends under the given parent", () => {
    const doc = newDocument();
    const parent = doc.createElementNS(SVG_NAMESPACE, "g");
    doc.appendChild(parent);
    const node = new SvgElement("circle").writeMarkup(doc, parent);
    expect(parent.lastChild).toBe(node);
  });

  it("writes xlink names as local names in the xlink namespace", () => {
    const node = new SvgElement("use").setAttribute("xlink:href", "a.svg").writeMarkup(newDocument(), null);
    const att = node.getAttributeNodeNS(XLINK_NAMESPACE, "href");
    expect(att?.value).toBe("a.svg");
    expect(att?.localName).toBe("href");
    expect(node.getAttributeNodeNS(null, "xlink:href")).toBeNull();
  });

  it("writes a style object in its own text form", () => {
    const el = new SvgElement("rect");
    el.style = Style.fromText("fill:red; stroke: blue");
    const node = el.writeMarkup(newDocument(), null);
    expect(node.getAttribute("style")).toBe("fill:red;stroke:blue");
    expect(node.hasAttribute("fill")).toBe(false);
  });

  it("writes a raw style string unchanged", () => {
    const node = new SvgElement("rect").setAttribute("style", "fill : green").writeMarkup(newDocument(), null);
    expect(node.getAttribute("style")).toBe("fill : green");
  });

  it("writes transforms and typed paths in canonical form", () => {
    const el = new SvgPathElement();
    el.transform = TransformList.fromText("translate(10, 20)");
    el.setAttribute("d", "M 0 0 L 10 10");
    expect(el.d.count).toBe(2);
    const node = el.writeMarkup(newDocument(), null);
    expect(node.getAttribute("transform")).toBe("translate(10,20)");
    expect(node.getAttribute("d")).toBe("M 0 0 10 10 ");
  });

  it("skips null values", () => {
    const node = new SvgElement("rect").setAttribute("opacity", null).writeMarkup(newDocument(), null);
    expect(node.hasAttribute("opacity")).toBe(false);
  });

  it("writes children in order", () => {
    const group = new SvgElement("g");
    group.appendChild(new SvgElement("rect"));
    group.appendChild(new SvgElement("circle"));
    const node = group.writeMarkup(newDocument(), null);
    expect(node.childNodes.length).toBe(2);
    expect(node.childNodes.item(0).nodeName).toBe("rect");
    expect(node.childNodes.item(1).nodeName).toBe("circle");
  });

  it("warns about an unbound prefix and writes the name as is", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const node = new SvgElement("g").setAttribute("inkscape:label", "Layer").writeMarkup(newDocument(), null);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(node.getAttribute("inkscape:label")).toBe("Layer");
  });

  it("skips an xlink name without a local part", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const node = new SvgElement("use").setAttribute("xlink:", "#shape").writeMarkup(newDocument(), null);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(node.attributes.length).toBe(0);
  });
});

describe("serializeElement", () => {
  it("produces markup that reads back with the xlink namespace", () => {
    const svg = new SvgElement("svg");
    svg.appendChild(new SvgElement("use")).setAttribute("xlink:href", "#shape");

    const root = parseRoot(serializeElement(svg));
    expect(root.namespaceURI).toBe(SVG_NAMESPACE);
    const use = root.getElementsByTagNameNS(SVG_NAMESPACE, "use").item(0);
    expect(use?.getAttributeNS(XLINK_NAMESPACE, "href")).toBe("#shape");
  });

  it("declares namespaces read from markup only once", () => {
    const svg = new SvgElement("svg");
    svg.readMarkup(parseRoot('<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink"/>'));
    svg.appendChild(new SvgElement("use")).setAttribute("xlink:href", "#shape");

    const text = serializeElement(svg);
    expect(text.match(/xmlns=/g)?.length).toBe(1);
    expect(text.match(/xmlns:xlink=/g)?.length).toBe(1);
  });
});
