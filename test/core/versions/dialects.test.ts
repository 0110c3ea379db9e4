import { describe, expect, it } from "vitest";

import { applyEdits, dialectOf, formatChangeSet, versionEdits } from "../../../src/core/versions/dialects.js";
import { isSnapshotVersion, toEclipseVersion } from "../../../src/core/versions/eclipse.js";
import { gradleDeclaredVersion } from "../../../src/core/versions/gradle-properties.js";
import { pomDeclaredVersions } from "../../../src/core/versions/pom.js";

const POM = [
	"<project>",
	"  <parent>",
	"    <groupId>org.example</groupId>",
	"    <version>1.0.0-SNAPSHOT</version>",
	"  </parent>",
	"  <version>1.0.0-SNAPSHOT</version>",
	"  <description>Version 1.0.0-SNAPSHOT of the tools</description>",
	"  <!-- <version>1.0.0-SNAPSHOT</version> -->",
	"  <dependencies>",
	"    <dependency>",
	"      <artifactId>x</artifactId>",
	"      <version>1.0.0-SNAPSHOT</version>",
	"    </dependency>",
	"    <dependency>",
	"      <version>3.2</version>",
	"    </dependency>",
	"  </dependencies>",
	"</project>",
	"",
].join("\n");

const FEATURE = [
	'<?xml version="1.0" encoding="UTF-8"?>',
	'<feature id="org.example.feature" label="Example" version="1.0.0.qualifier">',
	'  <includes id="org.example.sub" version="1.0.0.qualifier"/>',
	'  <plugin id="org.example.core" version="1.0.0.qualifier" unpack="false"/>',
	'  <plugin id="org.other" version="0.9.0"/>',
	"  <requires>",
	'    <import plugin="org.example.dep" version="1.0.0.qualifier" match="greaterOrEqual"/>',
	"  </requires>",
	"  <description>1.0.0.qualifier</description>",
	"</feature>",
	"",
].join("\n");

const MANIFEST = [
	"Manifest-Version: 1.0",
	"Bundle-SymbolicName: org.example.core;singleton:=true",
	"Bundle-Version: 1.0.0.qualifier",
	'Require-Bundle: org.example.dep;bundle-version="1.0.0.qualifier",',
	' org.other;bundle-version="1.0.0.qualifier";resolution:=optional,',
	' org.third;bundle-version="2.0.0"',
	'Import-Package: org.foo;version="1.0.0.qualifier"',
	"",
].join("\n");

const GRADLE = ["group=org.example", "version = 1.0.0-SNAPSHOT", "kotlinVersion=1.0.0-SNAPSHOT", ""].join("\n");

describe("dialectOf", () => {
	it("recognises descriptors by file name", () => {
		expect(dialectOf("pom.xml")).toBe("pom");
		expect(dialectOf("features/x/feature.xml")).toBe("feature");
		expect(dialectOf("ij/gradle.properties")).toBe("gradle-properties");
		expect(dialectOf("bundle/META-INF/MANIFEST.MF")).toBe("manifest");
	});

	it("ignores other files", () => {
		expect(dialectOf("MANIFEST.MF")).toBeNull();
		expect(dialectOf("build.gradle")).toBeNull();
		expect(dialectOf("pom.xml.bak")).toBeNull();
	});
});

describe("pom dialect", () => {
	it("rewrites version elements only", () => {
		const edits = versionEdits("pom", POM, "1.0.0-SNAPSHOT", "1.0.0");
		expect(edits.map((edit) => edit.line)).toEqual([4, 6, 12]);
		const expected = POM.split("\n")
			.map((line, index) => ([3, 5, 11].includes(index) ? line.replace("1.0.0-SNAPSHOT", "1.0.0") : line))
			.join("\n");
		expect(applyEdits(POM, edits)).toBe(expected);
	});

	it("leaves text outside version elements untouched", () => {
		const rewritten = applyEdits(POM, versionEdits("pom", POM, "1.0.0-SNAPSHOT", "1.0.0"));
		expect(rewritten).toContain("  <description>Version 1.0.0-SNAPSHOT of the tools</description>");
		expect(rewritten).toContain("  <!-- <version>1.0.0-SNAPSHOT</version> -->");
	});

	it("restores the original text when rewritten back", () => {
		const forward = applyEdits(POM, versionEdits("pom", POM, "1.0.0-SNAPSHOT", "1.1.0"));
		const back = applyEdits(forward, versionEdits("pom", forward, "1.1.0", "1.0.0-SNAPSHOT"));
		expect(back).toBe(POM);
	});

	it("finds nothing when no element carries the version", () => {
		expect(versionEdits("pom", POM, "9.9.9", "1.0.0")).toEqual([]);
	});

	it("reports project and parent versions as declared", () => {
		expect(pomDeclaredVersions(POM)).toEqual([
			{ element: "project/parent/version", version: "1.0.0-SNAPSHOT" },
			{ element: "project/version", version: "1.0.0-SNAPSHOT" },
		]);
	});

	it("does not report property references as declared versions", () => {
		expect(pomDeclaredVersions("<project><version>${revision}</version></project>")).toEqual([]);
	});
});

describe("feature dialect", () => {
	it("rewrites version attributes in Eclipse form", () => {
		const edits = versionEdits("feature", FEATURE, "1.0.0-SNAPSHOT", "1.0.0");
		expect(edits.map((edit) => [edit.line, edit.oldValue, edit.newValue])).toEqual([
			[2, "1.0.0.qualifier", "1.0.0"],
			[3, "1.0.0.qualifier", "1.0.0"],
			[4, "1.0.0.qualifier", "1.0.0"],
			[7, "1.0.0.qualifier", "1.0.0"],
		]);
		const rewritten = applyEdits(FEATURE, edits);
		expect(rewritten.split("\n")[3]).toBe('  <plugin id="org.example.core" version="1.0.0" unpack="false"/>');
		expect(rewritten.split("\n")[8]).toBe("  <description>1.0.0.qualifier</description>");
	});
});

describe("manifest dialect", () => {
	it("rewrites Bundle-Version and bundle-version references, continuation lines included", () => {
		const edits = versionEdits("manifest", MANIFEST, "1.0.0-SNAPSHOT", "1.0.0");
		expect(edits.map((edit) => edit.line)).toEqual([3, 4, 5]);
		expect(applyEdits(MANIFEST, edits).split("\n")).toEqual([
			"Manifest-Version: 1.0",
			"Bundle-SymbolicName: org.example.core;singleton:=true",
			"Bundle-Version: 1.0.0",
			'Require-Bundle: org.example.dep;bundle-version="1.0.0",',
			' org.other;bundle-version="1.0.0";resolution:=optional,',
			' org.third;bundle-version="2.0.0"',
			'Import-Package: org.foo;version="1.0.0.qualifier"',
			"",
		]);
	});

	it("keeps CRLF line endings", () => {
		const text = "Bundle-Version: 1.0.0.qualifier\r\nBundle-Name: x\r\n";
		const edits = versionEdits("manifest", text, "1.0.0-SNAPSHOT", "1.0.1-SNAPSHOT");
		expect(applyEdits(text, edits)).toBe("Bundle-Version: 1.0.1.qualifier\r\nBundle-Name: x\r\n");
	});
});

describe("gradle.properties dialect", () => {
	it("rewrites the version property only", () => {
		const edits = versionEdits("gradle-properties", GRADLE, "1.0.0-SNAPSHOT", "1.0.0");
		expect(applyEdits(GRADLE, edits)).toBe(
			["group=org.example", "version = 1.0.0", "kotlinVersion=1.0.0-SNAPSHOT", ""].join("\n"),
		);
	});

	it("reads the declared version", () => {
		expect(gradleDeclaredVersion(GRADLE)).toBe("1.0.0-SNAPSHOT");
		expect(gradleDeclaredVersion("group=x\n")).toBeNull();
	});
});

describe("Eclipse versions", () => {
	it("converts maven versions", () => {
		expect(toEclipseVersion("2.5.1-SNAPSHOT")).toBe("2.5.1.qualifier");
		expect(toEclipseVersion("2.5.1-baseline3")).toBe("2.5.1.baseline3");
		expect(toEclipseVersion("2.5.1")).toBe("2.5.1");
	});

	it("recognises snapshots in both notations", () => {
		expect(isSnapshotVersion("1.0-SNAPSHOT")).toBe(true);
		expect(isSnapshotVersion("1.0.qualifier")).toBe(true);
		expect(isSnapshotVersion("1.0")).toBe(false);
	});
});

describe("formatChangeSet", () => {
	it("groups changes by file and shows old and new values", () => {
		const text = formatChangeSet([
			{ repository: "", file: "pom.xml", dialect: "pom", line: 6, oldValue: "1.0", newValue: "1.1" },
			{ repository: "lang", file: "pom.xml", dialect: "pom", line: 4, oldValue: "1.0", newValue: "1.1" },
			{ repository: "lang", file: "pom.xml", dialect: "pom", line: 9, oldValue: "1.0", newValue: "1.1" },
		]);
		expect(text).toBe(
			[
				"pom.xml",
				"  6: - 1.0",
				"  6: + 1.1",
				"lang/pom.xml",
				"  4: - 1.0",
				"  4: + 1.1",
				"  9: - 1.0",
				"  9: + 1.1",
			].join("\n"),
		);
	});

	it("says so when nothing changed", () => {
		expect(formatChangeSet([])).toBe("No version changes");
	});
});
