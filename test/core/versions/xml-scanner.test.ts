import { describe, expect, it } from "vitest";

import { lineAt, scanXml } from "../../../src/core/versions/xml-scanner.js";

describe("scanXml", () => {
	it("reports leaf text with exact offsets", () => {
		const text = "<project><version>1.0</version></project>";
		expect(scanXml(text).texts).toEqual([{ path: ["project", "version"], value: "1.0", start: 18, end: 21 }]);
	});

	it("trims surrounding whitespace from the span", () => {
		const text = "<a><b>  x  </b></a>";
		const [node] = scanXml(text).texts;
		expect(node?.value).toBe("x");
		expect(node === undefined ? "" : text.slice(node.start, node.end)).toBe("x");
	});

	it("ignores elements with child elements", () => {
		const text = "<a><b>1</b>text</a>";
		expect(scanXml(text).texts.map((node) => node.path.join("/"))).toEqual(["a/b"]);
	});

	it("skips comments, processing instructions and doctype", () => {
		const text = [
			'<?xml version="1.0"?>',
			"<!DOCTYPE project>",
			"<project>",
			"  <!-- <version>1.0</version> -->",
			"  <version>2.0</version>",
			"</project>",
		].join("\n");
		expect(scanXml(text).texts.map((node) => node.value)).toEqual(["2.0"]);
		expect(scanXml(text).attributes).toEqual([]);
	});

	it("reports no text for an element containing a comment or CDATA", () => {
		expect(scanXml("<v>1.0<!-- old --></v>").texts).toEqual([]);
		expect(scanXml("<v><![CDATA[1.0]]></v>").texts).toEqual([]);
	});

	it("reports attributes with either quote style", () => {
		const text = `<feature id="f" version='1.0.0.qualifier'/>`;
		expect(scanXml(text).attributes).toEqual([
			{ path: ["feature"], name: "id", value: "f", start: 13, end: 14 },
			{ path: ["feature"], name: "version", value: "1.0.0.qualifier", start: 25, end: 40 },
		]);
	});

	it("keeps the path of nested attributes", () => {
		const text = '<feature><requires><import plugin="p" version="1"/></requires></feature>';
		expect(scanXml(text).attributes.map((attribute) => attribute.path.join("/"))).toEqual([
			"feature/requires/import",
			"feature/requires/import",
		]);
	});
});

describe("lineAt", () => {
	it("counts lines from one", () => {
		const text = "a\nb\nc";
		expect(lineAt(text, 0)).toBe(1);
		expect(lineAt(text, 2)).toBe(2);
		expect(lineAt(text, 4)).toBe(3);
	});
});
