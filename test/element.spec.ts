import { describe, expect, it } from "vitest";
import { SvgElement } from "../src/element/element";
import { SvgPathElement } from "../src/element/pathElement";
import { SVG_NAMESPACE } from "../src/element/markup";
import { TransformList } from "../src/attributes/transformList";
import { ElementTreeError } from "../src/errors";

describe("SvgElement", () => {
  it("creates a transform on first read when none was set", () => {
    const el = new SvgElement("g");
    const transform = el.transform;
    expect(transform).toBeInstanceOf(TransformList);
    expect(transform.count).toBe(0);
    expect(el.attributes.get("transform")).toBe(transform);
    expect(el.transform).toBe(transform);
  });

  it("creates an empty style on first read", () => {
    const el = new SvgElement("rect");
    expect(el.style.toString()).toBe("");
    expect(el.attributes.has("style")).toBe(true);
  });

  it("takes its id and namespace from options", () => {
    const el = new SvgElement("rect", { id: "r1" });
    expect(el.id).toBe("r1");
    expect(el.namespace).toBe(SVG_NAMESPACE);
    expect(new SvgElement("x", { namespace: "urn:test" }).namespace).toBe("urn:test");

    el.id = undefined;
    expect(el.attributes.has("id")).toBe(false);
  });

  it("moves a child that already has a parent", () => {
    const first = new SvgElement("g");
    const second = new SvgElement("g");
    const child = first.appendChild(new SvgElement("rect"));

    second.appendChild(child);
    expect(first.children).toEqual([]);
    expect(second.children).toEqual([child]);
    expect(child.parent).toBe(second);
  });

  it("refuses to build cycles", () => {
    const outer = new SvgElement("g");
    const inner = outer.appendChild(new SvgElement("g"));
    expect(() => inner.appendChild(outer)).toThrow(ElementTreeError);
    expect(() => outer.appendChild(outer)).toThrow(ElementTreeError);
  });

  it("refuses to remove an element it does not own", () => {
    expect(() => new SvgElement("g").removeChild(new SvgElement("rect"))).toThrow(
      "<rect> is not a child of <g>"
    );
  });
});

describe("SvgPathElement", () => {
  it("reads d as segments", () => {
    const el = new SvgPathElement();
    el.setAttribute("d", "M 0 0 L 10 10");
    expect(el.name).toBe("path");
    expect(el.d.count).toBe(2);
    expect(el.d.at(1)?.type).toBe("LineTo");
  });

  it("starts with an empty path", () => {
    expect(new SvgPathElement().d.count).toBe(0);
  });
});
