/**
 * E2E Tests for markdown to LaTeX conversion.
 *
 * Runs a realistic generated paper through the full pass pipeline and the
 * bibliography synthesizer, verifying structure, escaping and consumption of
 * placeholder metadata.
 */
import { describe, expect, it } from "vitest";
import { generateBibliography } from "../bibliography.js";
import { extractCitationKeys } from "./citations.js";
import { markdownToLatex } from "./transpiler.js";

/**
 * Generated paper fixture with every construct of the dialect: headings,
 * emphasis, both citation shapes, both list kinds, an inline table and all
 * three placeholder kinds.
 */
const GENERATED_PAPER_MD = `# Abstract

This review covers *remote* monitoring [Okafor2020].

## Introduction

Wearable sensors are common [Patel2018; Novak2021a].

### Scope

1. Devices
2. Outcomes

[FIGURE: Study flow]
Description: Screening and inclusion steps

## Results

[CHART]
Caption: Adoption by year
Type: bar
Description: Share of clinics using sensors

| Metric | Value | Note |
|:---|---:|---|
| Sensitivity | 0.91 | pooled |
| Specificity | 0.88 |

[TABLE]
Caption: Cost_per_site & staffing
| Site | Cost |
| A | 100 |

Key findings [Novak2021a]:
- accuracy above 90%
- follow_up of *12 months*



#### Limitations

Data: collected 2019-2022
Small samples [Okafor2020].
`;

function count(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe("E2E: generated paper to LaTeX", () => {
  const body = markdownToLatex(GENERATED_PAPER_MD);
  const lines = body.split("\n");

  it("should convert every heading level", () => {
    expect(lines[0]).toBe("\\section*{Abstract}");
    expect(lines).toContain("\\section{Introduction}");
    expect(lines).toContain("\\subsection{Scope}");
    expect(lines).toContain("\\section{Results}");
    expect(lines).toContain("\\subsubsection{Limitations}");
  });

  it("should convert emphasis and citations", () => {
    expect(body).toContain("This review covers \\textit{remote} monitoring \\cite{okafor2020}.");
    expect(body).toContain("Wearable sensors are common \\cite{patel2018,novak2021a}.");
    expect(body).toContain("Key findings \\cite{novak2021a}:");
  });

  it("should expand the figure placeholder from its inline label", () => {
    expect(body).toContain("\\textit{Screening and inclusion steps}");
    expect(body).toContain("\\caption{Study flow}\n\\label{fig:studyflow}");
  });

  it("should expand the chart placeholder from its metadata lines", () => {
    expect(body).toContain("\\textbf{bar chart}\\\\[1em]\\textit{Share of clinics using sensors}");
    expect(body).toContain("\\caption{Adoption by year}\n\\label{fig:adoptionbyyear}");
  });

  it("should convert the placeholder table with an escaped caption", () => {
    expect(body).toContain("\\caption{Cost\\_per\\_site \\& staffing}");
    expect(body).toContain("\\label{tab:costpersitestaffing}");
    expect(lines).toContain("Site & Cost \\\\");
    expect(lines).toContain("A & 100 \\\\");
    expect(body).not.toContain("| A | 100 |");
  });

  it("should convert the inline table, keeping short rows short", () => {
    expect(lines).toContain("\\begin{tabular}{lll}");
    expect(lines).toContain("Metric & Value & Note \\\\");
    expect(lines).toContain("Sensitivity & 0.91 & pooled \\\\");
    expect(lines).toContain("Specificity & 0.88 \\\\");
    expect(body).toContain("\\caption{Data Summary}\n\\label{tab:datasummary}");
  });

  it("should wrap both list kinds and escape plain items only", () => {
    expect(body).toContain(
      "\\begin{enumerate}\n  \\item Devices\n  \\item Outcomes\n\\end{enumerate}",
    );
    expect(body).toContain(
      "\\begin{itemize}\n  \\item accuracy above 90\\%\n  \\item follow_up of \\textit{12 months}\n\\end{itemize}",
    );
  });

  it("should leave every environment balanced", () => {
    for (const env of ["figure", "table", "tabular", "itemize", "enumerate"]) {
      expect(count(body, `\\begin{${env}}`)).toBe(count(body, `\\end{${env}}`));
    }
    expect(count(body, "\\begin{figure}")).toBe(2);
    expect(count(body, "\\begin{table}")).toBe(2);
  });

  it("should consume all metadata lines", () => {
    expect(body).not.toMatch(/^(Caption|Description|Type|Data):/m);
  });

  it("should leave no run of blank lines", () => {
    expect(body).not.toContain("\n\n\n");
    expect(body.endsWith("Small samples \\cite{okafor2020}.")).toBe(true);
  });

  it("should synthesize one bibliography record per cited key", () => {
    expect(extractCitationKeys(body)).toEqual(["novak2021a", "okafor2020", "patel2018"]);
    const bib = generateBibliography(body);
    expect(bib.match(/^@article\{[^,]+,$/gm)).toEqual([
      "@article{novak2021a,",
      "@article{okafor2020,",
      "@article{patel2018,",
    ]);
    expect(bib).toContain("  author = {Novak},\n  title = {Placeholder Title for Novak (2021)},");
  });
});
