import { describe, it, expect } from 'vitest';
import {
  expandPlaceholders,
  extractPlaceholderMetadata,
  findPlaceholderTags,
  stripMetadataLines,
} from './placeholders.js';
import { DEFAULT_TRANSPILE_OPTIONS } from './transpiler.js';

const options = DEFAULT_TRANSPILE_OPTIONS;

function expand(text: string): string {
  return stripMetadataLines(expandPlaceholders(text, options));
}

describe('findPlaceholderTags', () => {
  it('recognizes the three markers with free trailing text', () => {
    const tags = findPlaceholderTags('[FIGURE] a [TABLE 2: Costs] b [CHART-growth]');
    expect(tags.map((t) => t.kind)).toEqual(['figure', 'table', 'chart']);
    expect(tags[0]?.inlineLabel).toBeUndefined();
    expect(tags[1]?.inlineLabel).toBe('2: Costs');
    expect(tags[2]?.inlineLabel).toBe('growth');
  });

  it('records offsets of the whole tag', () => {
    const [tag] = findPlaceholderTags('ab[FIGURE: x]cd');
    expect(tag).toMatchObject({ start: 2, end: 13, inlineLabel: 'x' });
  });

  it('is case-sensitive on the marker', () => {
    expect(findPlaceholderTags('[figure] [Figure] [ FIGURE]')).toEqual([]);
  });
});

describe('extractPlaceholderMetadata', () => {
  it('reads caption, description and type lines', () => {
    const window = '\nCaption: Growth\nDescription: Revenue over time\nType: bar\n';
    expect(extractPlaceholderMetadata(window)).toEqual({
      caption: 'Growth',
      description: 'Revenue over time',
      type: 'bar',
    });
  });

  it('keeps the first occurrence of each key', () => {
    expect(extractPlaceholderMetadata('Caption: One\nCaption: Two')).toEqual({ caption: 'One' });
  });

  it('ignores keys that are not at the start of a line', () => {
    expect(extractPlaceholderMetadata('The Caption: nope')).toEqual({});
  });

  it('allows blank lines before the metadata block', () => {
    expect(extractPlaceholderMetadata('\n\nCaption: Spaced')).toEqual({ caption: 'Spaced' });
  });

  it('reads metadata around pipe rows', () => {
    expect(extractPlaceholderMetadata('\n| A | B |\n| 1 | 2 |\nCaption: After rows')).toEqual({
      caption: 'After rows',
    });
  });

  it('stops at the first blank line after the block', () => {
    expect(extractPlaceholderMetadata('\nCaption: Sales\n\nType: bar')).toEqual({ caption: 'Sales' });
  });

  it('stops at the first prose line', () => {
    expect(extractPlaceholderMetadata('\nIntro prose.\nCaption: Unrelated')).toEqual({});
  });
});

describe('expandPlaceholders', () => {
  it('builds a figure from caption and description lines', () => {
    const out = expand('[FIGURE]\nCaption: My Figure\nDescription: shows X');
    expect(out).toBe(
      [
        '\\begin{figure}[htbp]',
        '\\centering',
        '\\fbox{\\parbox{0.8\\textwidth}{\\centering\\vspace{2em}\\textit{shows X}\\vspace{2em}}}',
        '\\caption{My Figure}',
        '\\label{fig:myfigure}',
        '\\end{figure}',
        '',
      ].join('\n')
    );
    expect(out).not.toMatch(/^(Caption|Description):/m);
  });

  it('falls back to defaults without metadata', () => {
    const out = expand('[FIGURE]');
    expect(out).toContain('\\textit{Placeholder figure}');
    expect(out).toContain('\\caption{Figure}');
    expect(out).toContain('\\label{fig:figure}');
  });

  it('uses the inline label as caption when no caption line exists', () => {
    const out = expand('[FIGURE: System overview]');
    expect(out).toContain('\\caption{System overview}');
    expect(out).toContain('\\label{fig:systemoverview}');
  });

  it('prefers the caption line over the inline label', () => {
    const out = expand('[FIGURE: inline]\nCaption: Explicit');
    expect(out).toContain('\\caption{Explicit}');
  });

  it('renders the chart type', () => {
    const out = expand('[CHART]\nType: bar\nCaption: Sales');
    expect(out).toContain('\\textbf{bar chart}');
    expect(out).toContain('\\caption{Sales}');
    expect(out).toContain('\\label{fig:sales}');
  });

  it('defaults the chart type to line', () => {
    expect(expand('[CHART]')).toContain('\\textbf{line chart}');
    expect(expand('[CHART]')).toContain('\\caption{Chart}');
  });

  it('escapes captions', () => {
    expect(expand('[FIGURE]\nCaption: R&D spend_total')).toContain(
      '\\caption{R\\&D spend\\_total}'
    );
  });

  it('converts a table inside the window and removes its rows', () => {
    const out = expand(
      '[TABLE]\nCaption: Costs\n| Item | Cost |\n|---|---|\n| Rent | 100 |\nAfter the table.'
    );
    expect(out).toContain('\\caption{Costs}');
    expect(out).toContain('\\label{tab:costs}');
    expect(out).toContain('\\begin{tabular}{ll}');
    expect(out).toContain('Item & Cost \\\\');
    expect(out).toContain('Rent & 100 \\\\');
    expect(out).not.toContain('| Rent |');
    expect(out.endsWith('\nAfter the table.')).toBe(true);
  });

  it('accepts a window table without a separator row', () => {
    const out = expand('[TABLE]\n| A | B |\n| 1 | 2 |');
    expect(out).toContain('\\caption{Table}');
    expect(out).toContain('1 & 2 \\\\');
  });

  it('emits a boxed table when the window has no table', () => {
    const out = expand('[TABLE]\nCaption: Pending');
    expect(out).toContain('\\begin{table}[htbp]');
    expect(out).toContain('\\caption{Pending}');
    expect(out).toContain('\\textit{Placeholder table}');
    expect(out).not.toContain('tabular');
  });

  it('does not read metadata past the next tag', () => {
    const out = expand('[FIGURE]\nSome prose.\n[FIGURE]\nCaption: Second');
    const captions = out.match(/\\caption\{[^}]*\}/g);
    expect(captions).toEqual(['\\caption{Figure}', '\\caption{Second}']);
  });

  it('does not read metadata past the window', () => {
    const far = `[FIGURE]\nDescription: ${'x'.repeat(900)}\nCaption: Too far`;
    const near = expandPlaceholders(far, options);
    expect(near).toContain('\\caption{Figure}');
    expect(near).toContain('\\textit{Placeholder figure}');
    expect(
      expandPlaceholders(far, { ...options, placeholderWindow: 2000 })
    ).toContain('\\caption{Too far}');
  });

  it('ignores a metadata line cut by the window', () => {
    const text = '[FIGURE]\nCaption: A fairly long caption line';
    expect(expandPlaceholders(text, { ...options, placeholderWindow: 30 })).toContain(
      '\\caption{Figure}'
    );
    expect(expandPlaceholders(text, { ...options, placeholderWindow: 100 })).toContain(
      '\\caption{A fairly long caption line}'
    );
  });

  it('does not take a caption from later prose', () => {
    const out = expand('[FIGURE]\nIntro prose.\nCaption: Unrelated');
    expect(out).toContain('\\caption{Figure}');
  });

  it('leaves text without tags unchanged', () => {
    expect(expandPlaceholders('plain text', options)).toBe('plain text');
  });
});

describe('stripMetadataLines', () => {
  it('removes standalone metadata lines', () => {
    expect(stripMetadataLines('a\nCaption: x\nData: y\nb\nType: z')).toBe('a\nb\n');
  });

  it('keeps prose that mentions a key mid-line', () => {
    expect(stripMetadataLines('The Data: none')).toBe('The Data: none');
  });
});
