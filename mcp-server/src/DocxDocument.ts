import JSZip from 'jszip';
import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import * as crypto from 'crypto';
import * as path from 'path';
import {
  APP_XML,
  CONTENT_TYPES_NS,
  CONTENT_TYPES_XML,
  CONTENT_TYPE,
  DEFAULT_SECTION_PROPERTIES,
  DOCUMENT_RELS_XML,
  DOCUMENT_XML,
  MACRO_ENABLED_EXTENSIONS,
  MAIN_CONTENT_TYPES,
  PKG_REL_NS,
  R_NS,
  REL_TYPES,
  ROOT_RELS_XML,
  SETTINGS_XML,
  STYLES_XML,
  V_NS,
  W_NS,
  WATERMARK_SHAPE_PREFIX,
  XML_DECLARATION,
  borders,
  escapeXml,
  coreXml,
  fragmentXml,
  headerXml,
  watermarkParagraphXml,
} from './DocxTemplates';
import type { WatermarkOptions } from './DocxTemplates';

export type Alignment = 'left' | 'center' | 'right' | 'justify';
export type LineSpacingRule = 'at_least' | 'exactly' | 'multiple';
export type ProtectionLevel = 'none' | 'read_only' | 'form_filling' | 'comments' | 'revisions';

/** Direct paragraph formatting, lengths in points. */
export interface ParagraphFormat {
  alignment: Alignment;
  firstLineIndent: number;
  leftIndent: number;
  rightIndent: number;
  lineSpacing: number;
  lineSpacingRule: LineSpacingRule;
  beforeSpacing: number;
  afterSpacing: number;
}

export interface TableSnapshot {
  rows: number;
  columns: number;
  cells: string[][];
}

export type DocumentBlock =
  | { type: 'paragraph'; section: number; text: string; style: string | null; alignment: Alignment; headingLevel: number | null }
  | { type: 'table'; section: number; rows: string[][] };

export interface ReplaceOptions {
  matchCase?: boolean;
  matchWholeWord?: boolean;
}

export interface MergeStats {
  sections: number;
  paragraphs: number;
  tables: number;
}

const PROTECTION_EDIT_VALUES: Record<Exclude<ProtectionLevel, 'none'>, string> = {
  read_only: 'readOnly',
  form_filling: 'forms',
  comments: 'comments',
  revisions: 'trackedChanges',
};

const PROTECTION_LEVELS = ['read_only', 'form_filling', 'comments', 'revisions'] as const;

const PASSWORD_SPIN_COUNT = 100_000;

// Schema order of w:pPr children; new children are slotted into place.
const PPR_ORDER = [
  'pStyle', 'keepNext', 'keepLines', 'pageBreakBefore', 'framePr', 'widowControl', 'numPr',
  'suppressLineNumbers', 'pBdr', 'shd', 'tabs', 'suppressAutoHyphens', 'kinsoku', 'wordWrap',
  'overflowPunct', 'topLinePunct', 'autoSpaceDE', 'autoSpaceDN', 'bidi', 'adjustRightInd',
  'snapToGrid', 'spacing', 'ind', 'contextualSpacing', 'mirrorIndents', 'suppressOverlap', 'jc',
  'textDirection', 'textAlignment', 'textboxTightWrap', 'outlineLvl', 'divId', 'cnfStyle', 'rPr',
  'sectPr', 'pPrChange',
];

// w:settings children that must precede w:documentProtection.
const SETTINGS_BEFORE_PROTECTION = new Set([
  'writeProtection', 'view', 'zoom', 'removePersonalInformation', 'removeDateAndTime',
  'doNotDisplayPageBoundaries', 'displayBackgroundShape', 'printPostScriptOverText',
  'printFractionalCharacterWidth', 'printFormsData', 'embedTrueTypeFonts', 'embedSystemFonts',
  'saveSubsetFonts', 'saveFormsData', 'mirrorMargins', 'alignBordersAndEdges',
  'bordersDoNotSurroundHeader', 'bordersDoNotSurroundFooter', 'gutterAtTop', 'hideSpellingErrors',
  'hideGrammaticalErrors', 'activeWritingStyle', 'proofState', 'formsDesign', 'attachedTemplate',
  'linkStyles', 'stylePaneFormatFilter', 'stylePaneSortMethod', 'documentType', 'mailMerge',
  'revisionView', 'trackRevisions', 'doNotTrackMoves', 'doNotTrackFormatting',
]);

// Content that points into package parts the merge does not carry over.
const MERGE_DROPPED_ELEMENTS = [
  'drawing', 'pict', 'object', 'footnoteReference', 'endnoteReference', 'commentReference',
  'commentRangeStart', 'commentRangeEnd', 'headerReference', 'footerReference',
];

const SEPARATOR = '\uFFFF';

const TABLE_TEXT_WIDTH = 9360; // twips between default margins

const serializer = new XMLSerializer();

/**
 * A WordprocessingML package held in memory for the duration of one operation.
 *
 * Paragraph and table indices are per section and count body-level elements only;
 * content nested inside tables is reached through the table accessors.
 */
export class DocxDocument {
  private _zip: JSZip;
  private _parts = new Map<string, Document>();
  private _dirty = new Set<string>();
  private _mainPath: string;
  private _main: Document;
  private _body: Element;

  private constructor(zip: JSZip, mainPath: string, main: Document, body: Element) {
    this._zip = zip;
    this._mainPath = mainPath;
    this._main = main;
    this._body = body;
    this._parts.set(mainPath, main);
  }

  public static async load(data: Buffer | Uint8Array): Promise<DocxDocument> {
    const zip = await JSZip.loadAsync(data);
    const mainPath = await findMainDocumentPath(zip);
    const file = zip.file(mainPath);
    if (!file) throw new Error(`Not a Word document: ${mainPath} is missing`);
    const main = parseXml(await file.async('string'), mainPath);
    const body = firstChild(main.documentElement, 'body');
    if (!body) throw new Error(`Not a Word document: ${mainPath} has no body`);
    const doc = new DocxDocument(zip, mainPath, main, body);
    await doc.loadRelatedParts();
    return doc;
  }

  public static async createBlank(): Promise<DocxDocument> {
    const zip = new JSZip();
    zip.file('[Content_Types].xml', CONTENT_TYPES_XML);
    zip.file('_rels/.rels', ROOT_RELS_XML);
    zip.file('word/document.xml', DOCUMENT_XML);
    zip.file('word/_rels/document.xml.rels', DOCUMENT_RELS_XML);
    zip.file('word/styles.xml', STYLES_XML);
    zip.file('word/settings.xml', SETTINGS_XML);
    zip.file('docProps/core.xml', coreXml(new Date().toISOString().replace(/\.\d{3}Z$/, 'Z')));
    zip.file('docProps/app.xml', APP_XML);
    return DocxDocument.load(await zip.generateAsync({ type: 'nodebuffer' }));
  }

  // Parts the editing operations touch besides the main document.
  private async loadRelatedParts(): Promise<void> {
    for (const partPath of [relsPathFor(this._mainPath), '[Content_Types].xml']) {
      const file = this._zip.file(partPath);
      if (file) this._parts.set(partPath, parseXml(await file.async('string'), partPath));
    }
    for (const rel of this.relationships()) {
      if (rel.type !== REL_TYPES.settings && rel.type !== REL_TYPES.header && rel.type !== REL_TYPES.styles) continue;
      const file = this._zip.file(rel.target);
      if (file) this._parts.set(rel.target, parseXml(await file.async('string'), rel.target));
    }
  }

  // ============================================================
  // Sections
  // ============================================================

  get sectionCount(): number {
    return this.sections().length;
  }

  /** Body children grouped by section; a section ends at a paragraph carrying w:sectPr. */
  private sections(): Element[][] {
    const groups: Element[][] = [];
    let current: Element[] = [];
    for (const child of elementChildren(this._body)) {
      if (isW(child, 'sectPr')) continue;
      current.push(child);
      if (isW(child, 'p') && paragraphSectPr(child)) {
        groups.push(current);
        current = [];
      }
    }
    if (current.length > 0 || groups.length === 0 || this.bodySectPr()) groups.push(current);
    return groups;
  }

  private section(index: number): Element[] {
    const groups = this.sections();
    const group = groups[index];
    if (!group) throw new Error(`Section index ${index} out of range (document has ${groups.length} sections)`);
    return group;
  }

  private bodySectPr(): Element | null {
    return firstChild(this._body, 'sectPr');
  }

  private isLastSection(index: number): boolean {
    return index === this.sections().length - 1;
  }

  // ============================================================
  // Paragraphs
  // ============================================================

  paragraphCount(sectionIndex: number): number {
    return this.section(sectionIndex).filter(el => isW(el, 'p')).length;
  }

  private paragraph(sectionIndex: number, index: number): Element {
    const paragraphs = this.section(sectionIndex).filter(el => isW(el, 'p'));
    const paragraph = paragraphs[index];
    if (!paragraph) {
      throw new Error(`Paragraph index ${index} out of range (section ${sectionIndex} has ${paragraphs.length} paragraphs)`);
    }
    return paragraph;
  }

  getParagraphText(sectionIndex: number, index: number): string {
    return paragraphText(this.paragraph(sectionIndex, index));
  }

  getParagraphStyle(sectionIndex: number, index: number): string | null {
    return paragraphStyle(this.paragraph(sectionIndex, index));
  }

  /**
   * Display name of the paragraph's style as the styles part declares it ("heading 1" for
   * the id Heading1). Unstyled paragraphs report the default paragraph style. Falls back
   * to the style id when the package has no entry for it.
   */
  getParagraphStyleName(sectionIndex: number, index: number): string | null {
    const styleId = paragraphStyle(this.paragraph(sectionIndex, index));
    const rel = this.relationships().find(r => r.type === REL_TYPES.styles);
    const styles = rel ? this._parts.get(rel.target) : undefined;
    if (!styles) return styleId;
    const style = elementChildren(styles.documentElement).find(el => isW(el, 'style') && (styleId
      ? getW(el, 'styleId') === styleId
      : getW(el, 'type') === 'paragraph' && ['1', 'true', 'on'].includes(getW(el, 'default') ?? '')));
    const name = style ? getW(firstChild(style, 'name'), 'val') : null;
    return name ?? styleId;
  }

  /** Replaces the paragraph's content with `text`, keeping paragraph and first-run formatting. */
  setParagraphText(sectionIndex: number, index: number, text: string): string {
    const paragraph = this.paragraph(sectionIndex, index);
    const original = paragraphText(paragraph);
    replaceParagraphContent(paragraph, text);
    this.markModified(this._mainPath);
    return original;
  }

  /**
   * Inserts a paragraph before the one currently at `beforeIndex`, or at the end of the
   * section when omitted or equal to the paragraph count. Returns the new paragraph's index.
   */
  insertParagraph(sectionIndex: number, text: string, beforeIndex?: number): number {
    const count = this.paragraphCount(sectionIndex);
    const paragraph = this.createElement('p');
    replaceParagraphContent(paragraph, text);

    if (beforeIndex !== undefined && beforeIndex < count) {
      const anchor = this.paragraph(sectionIndex, beforeIndex);
      this._body.insertBefore(paragraph, anchor);
    } else {
      this.appendToSection(sectionIndex, paragraph);
    }
    this.markModified(this._mainPath);
    return this.section(sectionIndex).filter(el => isW(el, 'p')).indexOf(paragraph);
  }

  deleteParagraph(sectionIndex: number, index: number): string {
    const paragraph = this.paragraph(sectionIndex, index);
    const text = paragraphText(paragraph);
    const sectPr = paragraphSectPr(paragraph);
    if (sectPr) {
      // The section break has to survive on the preceding paragraph.
      const group = this.section(sectionIndex);
      const previous = group[group.indexOf(paragraph) - 1];
      if (!previous || !isW(previous, 'p')) {
        throw new Error(`Paragraph ${index} ends section ${sectionIndex} and cannot be deleted`);
      }
      ensurePPrChild(previous, 'sectPr', sectPr);
    }
    this._body.removeChild(paragraph);
    this.markModified(this._mainPath);
    return text;
  }

  getParagraphFormat(sectionIndex: number, index: number): ParagraphFormat {
    return readParagraphFormat(this.paragraph(sectionIndex, index));
  }

  applyParagraphFormat(sectionIndex: number, index: number, changes: Partial<ParagraphFormat>): void {
    const paragraph = this.paragraph(sectionIndex, index);

    if (changes.alignment !== undefined) {
      const jc = ensurePPrChild(paragraph, 'jc');
      setW(jc, 'val', changes.alignment === 'justify' ? 'both' : changes.alignment);
    }

    if (changes.firstLineIndent !== undefined || changes.leftIndent !== undefined || changes.rightIndent !== undefined) {
      const ind = ensurePPrChild(paragraph, 'ind');
      if (changes.firstLineIndent !== undefined) {
        removeW(ind, 'hanging');
        setW(ind, 'firstLine', String(toTwips(changes.firstLineIndent)));
      }
      if (changes.leftIndent !== undefined) {
        removeW(ind, 'start');
        setW(ind, 'left', String(toTwips(changes.leftIndent)));
      }
      if (changes.rightIndent !== undefined) {
        removeW(ind, 'end');
        setW(ind, 'right', String(toTwips(changes.rightIndent)));
      }
    }

    if (changes.lineSpacing !== undefined || changes.beforeSpacing !== undefined || changes.afterSpacing !== undefined) {
      const spacing = ensurePPrChild(paragraph, 'spacing');
      if (changes.lineSpacing !== undefined) {
        const rule = changes.lineSpacingRule ?? readLineRule(getW(spacing, 'lineRule'));
        setW(spacing, 'line', String(toTwips(changes.lineSpacing)));
        setW(spacing, 'lineRule', rule === 'exactly' ? 'exact' : rule === 'at_least' ? 'atLeast' : 'auto');
      }
      if (changes.beforeSpacing !== undefined) {
        removeW(spacing, 'beforeAutospacing');
        setW(spacing, 'before', String(toTwips(changes.beforeSpacing)));
      }
      if (changes.afterSpacing !== undefined) {
        removeW(spacing, 'afterAutospacing');
        setW(spacing, 'after', String(toTwips(changes.afterSpacing)));
      }
    }

    this.markModified(this._mainPath);
  }

  // ============================================================
  // Tables
  // ============================================================

  tableCount(sectionIndex: number): number {
    return this.section(sectionIndex).filter(el => isW(el, 'tbl')).length;
  }

  private table(sectionIndex: number, index: number): Element {
    const tables = this.section(sectionIndex).filter(el => isW(el, 'tbl'));
    const table = tables[index];
    if (!table) throw new Error(`Table index ${index} out of range (section ${sectionIndex} has ${tables.length} tables)`);
    return table;
  }

  /**
   * Inserts an empty rows x columns table after the given paragraph, or at the end of the
   * section. Returns the table's index among the section's tables.
   */
  insertTable(sectionIndex: number, rows: number, columns: number, options: { afterParagraph?: number; style?: string } = {}): number {
    const table = this.buildTable(rows, columns, options.style);
    if (options.afterParagraph !== undefined) {
      const anchor = this.paragraph(sectionIndex, options.afterParagraph);
      const sectPr = paragraphSectPr(anchor);
      insertAfter(anchor, table);
      if (sectPr) {
        // The anchor ended the section; carry the break past the table.
        const breakParagraph = this.createElement('p');
        insertAfter(table, breakParagraph);
        ensurePPrChild(breakParagraph, 'sectPr', sectPr);
      }
    } else {
      this.appendToSection(sectionIndex, table);
    }
    this.markModified(this._mainPath);
    return this.section(sectionIndex).filter(el => isW(el, 'tbl')).indexOf(table);
  }

  private buildTable(rows: number, columns: number, style?: string): Element {
    const cellWidth = Math.floor(TABLE_TEXT_WIDTH / columns);
    const tblPr = style
      ? `<w:tblPr><w:tblStyle w:val="${styleId(style)}"/><w:tblW w:w="0" w:type="auto"/><w:tblLook w:val="04A0" w:firstRow="1" w:lastRow="0" w:firstColumn="1" w:lastColumn="0" w:noHBand="0" w:noVBand="1"/></w:tblPr>`
      : `<w:tblPr><w:tblW w:w="0" w:type="auto"/><w:tblBorders>${borders('single', 4)}</w:tblBorders><w:tblLook w:val="04A0" w:firstRow="1" w:lastRow="0" w:firstColumn="1" w:lastColumn="0" w:noHBand="0" w:noVBand="1"/></w:tblPr>`;
    const grid = `<w:tblGrid>${`<w:gridCol w:w="${cellWidth}"/>`.repeat(columns)}</w:tblGrid>`;
    const cell = `<w:tc><w:tcPr><w:tcW w:w="${cellWidth}" w:type="dxa"/></w:tcPr><w:p/></w:tc>`;
    const row = `<w:tr>${cell.repeat(columns)}</w:tr>`;
    return this.importFragment(`<w:tbl>${tblPr}${grid}${row.repeat(rows)}</w:tbl>`)[0];
  }

  getTable(sectionIndex: number, index: number): TableSnapshot {
    return snapshotTable(this.table(sectionIndex, index));
  }

  deleteTable(sectionIndex: number, index: number): TableSnapshot {
    const table = this.table(sectionIndex, index);
    const snapshot = snapshotTable(table);
    this._body.removeChild(table);
    this.markModified(this._mainPath);
    return snapshot;
  }

  /** Sets the text of the cell's first paragraph and returns what it held before. */
  setCellText(sectionIndex: number, tableIndex: number, row: number, column: number, text: string): string {
    const rowEl = elementChildren(this.table(sectionIndex, tableIndex)).filter(el => isW(el, 'tr'))[row];
    if (!rowEl) throw new Error(`Row index ${row} out of range`);
    const cell = elementChildren(rowEl).filter(el => isW(el, 'tc'))[column];
    if (!cell) throw new Error(`Column index ${column} out of range in row ${row}`);

    let paragraph = firstChild(cell, 'p');
    if (!paragraph) {
      paragraph = this.createElement('p');
      cell.appendChild(paragraph);
    }
    const original = paragraphText(paragraph);
    replaceParagraphContent(paragraph, text);
    this.markModified(this._mainPath);
    return original;
  }

  // ============================================================
  // Section placement helpers
  // ============================================================

  /** Appends a block element as the last element of a section. */
  private appendToSection(sectionIndex: number, element: Element): void {
    const group = this.section(sectionIndex);
    if (this.isLastSection(sectionIndex)) {
      const sectPr = this.bodySectPr();
      if (sectPr) {
        this._body.insertBefore(element, sectPr);
      } else {
        this._body.appendChild(element);
      }
      return;
    }

    // A non-final section ends at the paragraph carrying its w:sectPr; the break moves
    // to the new last element.
    const breakParagraph = group[group.length - 1];
    const sectPr = paragraphSectPr(breakParagraph);
    insertAfter(breakParagraph, element);
    if (!sectPr) return;
    if (isW(element, 'p')) {
      ensurePPrChild(element, 'sectPr', sectPr);
    } else {
      const carrier = this.createElement('p');
      insertAfter(element, carrier);
      ensurePPrChild(carrier, 'sectPr', sectPr);
    }
  }

  // ============================================================
  // Find & replace
  // ============================================================

  /** Replaces every match in the main document, across run boundaries. Returns the match count. */
  replaceText(find: string, replacement: string, options: ReplaceOptions = {}): number {
    if (!find) throw new Error('Find text cannot be empty');
    const escaped = find.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const source = options.matchWholeWord ? `(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])` : escaped;
    const pattern = new RegExp(source, options.matchCase ? 'gu' : 'giu');

    let count = 0;
    for (const paragraph of descendants(this._body, 'p')) {
      count += replaceInParagraph(paragraph, pattern, replacement);
    }
    if (count > 0) this.markModified(this._mainPath);
    return count;
  }

  // ============================================================
  // Protection
  // ============================================================

  setProtection(level: ProtectionLevel, password?: string): void {
    const settings = this.ensureSettings();
    const root = settings.documentElement;
    const existing = firstChild(root, 'documentProtection');
    if (existing) root.removeChild(existing);

    if (level !== 'none') {
      const protection = settings.createElementNS(W_NS, 'w:documentProtection');
      setW(protection, 'edit', PROTECTION_EDIT_VALUES[level]);
      setW(protection, 'enforcement', '1');
      if (password) {
        const salt = crypto.randomBytes(16);
        setW(protection, 'algorithmName', 'SHA-512');
        setW(protection, 'hashValue', hashPassword(password, salt, PASSWORD_SPIN_COUNT).toString('base64'));
        setW(protection, 'saltValue', salt.toString('base64'));
        setW(protection, 'spinCount', String(PASSWORD_SPIN_COUNT));
      }
      const before = elementChildren(root).find(el => !SETTINGS_BEFORE_PROTECTION.has(el.localName));
      if (before) {
        root.insertBefore(protection, before);
      } else {
        root.appendChild(protection);
      }
    }
    this.markModified(this.settingsPath());
  }

  getProtection(): { level: ProtectionLevel; hasPassword: boolean } {
    const settingsPath = this.relationships().find(rel => rel.type === REL_TYPES.settings)?.target;
    const settings = settingsPath ? this._parts.get(settingsPath) : undefined;
    const protection = settings ? firstChild(settings.documentElement, 'documentProtection') : null;
    const enforcement = getW(protection, 'enforcement');
    if (!protection || enforcement === '0' || enforcement === 'false') {
      return { level: 'none', hasPassword: false };
    }
    const edit = getW(protection, 'edit');
    const level = PROTECTION_LEVELS.find(key => PROTECTION_EDIT_VALUES[key] === edit) ?? 'none';
    return { level, hasPassword: protection.hasAttributeNS(W_NS, 'hashValue') };
  }

  private settingsPath(): string {
    const rel = this.relationships().find(r => r.type === REL_TYPES.settings);
    return rel ? rel.target : path.posix.join(path.posix.dirname(this._mainPath), 'settings.xml');
  }

  private ensureSettings(): Document {
    const settingsPath = this.settingsPath();
    const loaded = this._parts.get(settingsPath);
    if (loaded) return loaded;
    const settings = parseXml(SETTINGS_XML, settingsPath);
    this._parts.set(settingsPath, settings);
    this.addRelationship(REL_TYPES.settings, path.posix.basename(settingsPath));
    this.addContentTypeOverride(settingsPath, CONTENT_TYPE.settings);
    this.markModified(settingsPath);
    return settings;
  }

  // ============================================================
  // Watermark
  // ============================================================

  /** Puts a diagonal text watermark into the default header of every section. */
  addTextWatermark(options: WatermarkOptions): void {
    const sectPrs = this.allSectionProperties();
    let sharedHeader: string | null = null;
    const touched = new Set<string>();
    let shapeNumber = 1;

    for (const sectPr of sectPrs) {
      const reference = elementChildren(sectPr)
        .find(el => isW(el, 'headerReference') && getW(el, 'type') === 'default');
      const relId = reference?.getAttributeNS(R_NS, 'id');
      let headerPath = relId ? this.relationships().find(rel => rel.id === relId)?.target : undefined;

      if (!headerPath || !this._parts.has(headerPath)) {
        if (!sharedHeader) sharedHeader = this.createHeaderPart();
        headerPath = sharedHeader;
        if (reference) sectPr.removeChild(reference);
        const newReference = this._main.createElementNS(W_NS, 'w:headerReference');
        setW(newReference, 'type', 'default');
        newReference.setAttributeNS(R_NS, 'r:id', this.relationshipIdFor(headerPath));
        sectPr.insertBefore(newReference, sectPr.firstChild);
        this.markModified(this._mainPath);
      }
      if (touched.has(headerPath)) continue;
      touched.add(headerPath);

      const header = this._parts.get(headerPath);
      if (!header) continue;
      for (const paragraph of elementChildren(header.documentElement).filter(el => isW(el, 'p'))) {
        if (containsWatermark(paragraph)) header.documentElement.removeChild(paragraph);
      }
      const [watermark] = importFragment(header, watermarkParagraphXml(options, shapeNumber++));
      header.documentElement.appendChild(watermark);
      this.markModified(headerPath);
    }
  }

  hasWatermark(): boolean {
    for (const [partPath, part] of this._parts) {
      if (!/header\d*\.xml$/.test(partPath)) continue;
      if (elementChildren(part.documentElement).some(el => isW(el, 'p') && containsWatermark(el))) return true;
    }
    return false;
  }

  private allSectionProperties(): Element[] {
    const result: Element[] = [];
    for (const group of this.sections()) {
      const last = group[group.length - 1];
      const sectPr = last && isW(last, 'p') ? paragraphSectPr(last) : null;
      if (sectPr) result.push(sectPr);
    }
    let bodySectPr = this.bodySectPr();
    if (!bodySectPr) {
      [bodySectPr] = this.importFragment(DEFAULT_SECTION_PROPERTIES);
      this._body.appendChild(bodySectPr);
    }
    result.push(bodySectPr);
    return result;
  }

  private createHeaderPart(): string {
    const dir = path.posix.dirname(this._mainPath);
    let n = 1;
    while (this._zip.file(`${dir}/header${n}.xml`) || this._parts.has(`${dir}/header${n}.xml`)) n++;
    const headerPath = `${dir}/header${n}.xml`;
    this._parts.set(headerPath, parseXml(headerXml(''), headerPath));
    this.addRelationship(REL_TYPES.header, `header${n}.xml`);
    this.addContentTypeOverride(headerPath, CONTENT_TYPE.header);
    this.markModified(headerPath);
    return headerPath;
  }

  // ============================================================
  // Merge
  // ============================================================

  /**
   * Appends `other`'s body as new sections starting on a new page. Drawings, embedded
   * objects and note/comment references are dropped and hyperlinks are reduced to their
   * runs, because the parts they point at are not carried over.
   */
  appendDocument(other: DocxDocument): MergeStats {
    const stats: MergeStats = { sections: other.sectionCount, paragraphs: 0, tables: 0 };
    for (let s = 0; s < other.sectionCount; s++) {
      stats.paragraphs += other.paragraphCount(s);
      stats.tables += other.tableCount(s);
    }

    // The current final section becomes a paragraph-level break (next page by default).
    const ownSectPr = this.bodySectPr() ?? this.importFragment(DEFAULT_SECTION_PROPERTIES)[0];
    if (ownSectPr.parentNode) this._body.removeChild(ownSectPr);
    const breakParagraph = this.createElement('p');
    this._body.appendChild(breakParagraph);
    ensurePPrChild(breakParagraph, 'sectPr', ownSectPr);

    for (const child of elementChildren(other._body)) {
      const imported = this._main.importNode(child, true);
      if (isElement(imported)) {
        cleanMergedContent(imported);
        this._body.appendChild(imported);
      }
    }
    if (!this.bodySectPr()) {
      this._body.appendChild(this.importFragment(DEFAULT_SECTION_PROPERTIES)[0]);
    }
    this.markModified(this._mainPath);
    return stats;
  }

  // ============================================================
  // Export
  // ============================================================

  /** Body content in reading order, for the text-based renderers. */
  blocks(): DocumentBlock[] {
    const result: DocumentBlock[] = [];
    this.sections().forEach((group, section) => {
      for (const element of group) {
        if (isW(element, 'p')) {
          const style = paragraphStyle(element);
          result.push({
            type: 'paragraph',
            section,
            text: paragraphText(element),
            style,
            alignment: readParagraphFormat(element).alignment,
            headingLevel: headingLevel(style),
          });
        } else if (isW(element, 'tbl')) {
          result.push({ type: 'table', section, rows: snapshotTable(element).cells });
        }
      }
    });
    return result;
  }

  getAllText(): string {
    return this.blocks()
      .map(block => block.type === 'paragraph' ? block.text : block.rows.map(row => row.join('\t')).join('\n'))
      .join('\n');
  }

  /** The whole package as a single Flat OPC XML document. */
  async toFlatOpc(): Promise<string> {
    this.flushParts();
    const contentTypes = this._parts.get('[Content_Types].xml');
    const parts: string[] = [];
    const names = Object.keys(this._zip.files).filter(name => !this._zip.files[name].dir && name !== '[Content_Types].xml').sort();
    for (const name of names) {
      const file = this._zip.file(name);
      if (!file) continue;
      const contentType = contentTypes ? contentTypeFor(contentTypes, name) : 'application/octet-stream';
      if (/xml$/.test(contentType)) {
        const xml = (await file.async('string')).replace(/^\s*<\?xml[^>]*\?>\s*/, '');
        parts.push(`<pkg:part pkg:name="${escapeXml(`/${name}`)}" pkg:contentType="${escapeXml(contentType)}"><pkg:xmlData>${xml}</pkg:xmlData></pkg:part>`);
      } else {
        const data = await file.async('base64');
        parts.push(`<pkg:part pkg:name="${escapeXml(`/${name}`)}" pkg:contentType="${escapeXml(contentType)}" pkg:compression="store"><pkg:binaryData>${data}</pkg:binaryData></pkg:part>`);
      }
    }
    return `${XML_DECLARATION}\n<?mso-application progid="Word.Document"?>\n`
      + `<pkg:package xmlns:pkg="http://schemas.microsoft.com/office/2006/xmlPackage">${parts.join('')}</pkg:package>`;
  }

  // ============================================================
  // Save
  // ============================================================

  /**
   * Marks the package as a document, template or macro-enabled variant to match `extension`.
   * A kind that cannot hold macros also loses the VBA project.
   */
  setPackageKind(extension: string): void {
    const kind = extension.toLowerCase();
    const contentType = MAIN_CONTENT_TYPES[kind];
    const types = this._parts.get('[Content_Types].xml');
    if (!contentType || !types) return;
    if (!MACRO_ENABLED_EXTENSIONS.has(kind)) this.dropVbaProject(types);
    const override = elementChildren(types.documentElement)
      .find(el => el.localName === 'Override' && el.getAttribute('PartName') === `/${this._mainPath}`);
    if (override) {
      if (override.getAttribute('ContentType') === contentType) return;
      override.setAttribute('ContentType', contentType);
      this.markModified('[Content_Types].xml');
    } else {
      this.addContentTypeOverride(this._mainPath, contentType);
    }
  }

  private dropVbaProject(types: Document): void {
    const relsPath = relsPathFor(this._mainPath);
    const rels = this._parts.get(relsPath);
    if (!rels) return;
    const base = path.posix.dirname(this._mainPath);
    const vbaRels = elementChildren(rels.documentElement)
      .filter(el => el.localName === 'Relationship' && el.getAttribute('Type') === REL_TYPES.vbaProject);
    if (vbaRels.length === 0) return;

    const removed = new Set<string>();
    for (const rel of vbaRels) {
      rels.documentElement.removeChild(rel);
      const target = resolveTarget(base, rel.getAttribute('Target') ?? '');
      // vbaData.xml hangs off the project's own relationships
      for (const partPath of [target, relsPathFor(target), path.posix.join(path.posix.dirname(target), 'vbaData.xml')]) {
        if (!this._zip.file(partPath)) continue;
        this._zip.remove(partPath);
        removed.add(`/${partPath}`);
      }
    }
    this.markModified(relsPath);

    for (const entry of elementChildren(types.documentElement)) {
      const staleOverride = entry.localName === 'Override' && removed.has(entry.getAttribute('PartName') ?? '');
      const vbaDefault = entry.localName === 'Default' && entry.getAttribute('ContentType') === CONTENT_TYPE.vbaProject;
      if (staleOverride || vbaDefault) types.documentElement.removeChild(entry);
    }
    this.markModified('[Content_Types].xml');
  }

  async save(): Promise<Buffer> {
    this.flushParts();
    return this._zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  private flushParts(): void {
    for (const partPath of this._dirty) {
      const part = this._parts.get(partPath);
      if (part) this._zip.file(partPath, serializeXml(part));
    }
    this._dirty.clear();
  }

  private markModified(partPath: string): void {
    this._dirty.add(partPath);
  }

  // ============================================================
  // Package plumbing
  // ============================================================

  private createElement(name: string): Element {
    return this._main.createElementNS(W_NS, `w:${name}`);
  }

  private importFragment(xml: string): Element[] {
    return importFragment(this._main, xml);
  }

  private relationships(): Array<{ id: string; type: string; target: string }> {
    const rels = this._parts.get(relsPathFor(this._mainPath));
    if (!rels) return [];
    const base = path.posix.dirname(this._mainPath);
    return elementChildren(rels.documentElement)
      .filter(el => el.localName === 'Relationship' && el.getAttribute('TargetMode') !== 'External')
      .map(el => ({
        id: el.getAttribute('Id') ?? '',
        type: el.getAttribute('Type') ?? '',
        target: resolveTarget(base, el.getAttribute('Target') ?? ''),
      }));
  }

  private relationshipIdFor(partPath: string): string {
    const rel = this.relationships().find(r => r.target === partPath);
    if (!rel) throw new Error(`No relationship targets ${partPath}`);
    return rel.id;
  }

  private addRelationship(type: string, target: string): string {
    const relsPath = relsPathFor(this._mainPath);
    let rels = this._parts.get(relsPath);
    if (!rels) {
      rels = parseXml(`${XML_DECLARATION}<Relationships xmlns="${PKG_REL_NS}"/>`, relsPath);
      this._parts.set(relsPath, rels);
    }
    const used = new Set(elementChildren(rels.documentElement).map(el => el.getAttribute('Id')));
    let n = 1;
    while (used.has(`rId${n}`)) n++;
    const rel = rels.createElementNS(PKG_REL_NS, 'Relationship');
    rel.setAttribute('Id', `rId${n}`);
    rel.setAttribute('Type', type);
    rel.setAttribute('Target', target);
    rels.documentElement.appendChild(rel);
    this.markModified(relsPath);
    return `rId${n}`;
  }

  private addContentTypeOverride(partPath: string, contentType: string): void {
    const types = this._parts.get('[Content_Types].xml');
    if (!types) throw new Error('Package has no [Content_Types].xml');
    const override = types.createElementNS(CONTENT_TYPES_NS, 'Override');
    override.setAttribute('PartName', `/${partPath}`);
    override.setAttribute('ContentType', contentType);
    types.documentElement.appendChild(override);
    this.markModified('[Content_Types].xml');
  }
}

// ============================================================
// XML helpers
// ============================================================

function parseXml(xml: string, partPath: string): Document {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => { throw new Error(`Malformed XML in ${partPath}: ${msg}`); },
      fatalError: (msg: string) => { throw new Error(`Malformed XML in ${partPath}: ${msg}`); },
    },
  });
  const doc = parser.parseFromString(xml, 'text/xml');
  if (!doc || !doc.documentElement) throw new Error(`Malformed XML in ${partPath}`);
  return doc;
}

function serializeXml(doc: Document): string {
  const xml = serializer.serializeToString(doc).replace(/^\s*<\?xml[^>]*\?>\s*/, '');
  return `${XML_DECLARATION}\n${xml}`;
}

function importFragment(target: Document, inner: string): Element[] {
  const fragment = parseXml(fragmentXml(inner), 'fragment');
  const result: Element[] = [];
  for (const child of elementChildren(fragment.documentElement)) {
    const imported = target.importNode(child, true);
    if (isElement(imported)) result.push(imported);
  }
  return result;
}

function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === 1;
}

function isW(node: Node, localName: string): node is Element {
  return isElement(node) && node.namespaceURI === W_NS && node.localName === localName;
}

function elementChildren(parent: Node): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (isElement(node)) result.push(node);
  }
  return result;
}

function firstChild(parent: Node, localName: string): Element | null {
  return elementChildren(parent).find(el => isW(el, localName)) ?? null;
}

/** Document-order descendants named `localName`, not descending into matches. */
function descendants(root: Element, localName: string): Element[] {
  const result: Element[] = [];
  const walk = (el: Element) => {
    for (const child of elementChildren(el)) {
      if (isW(child, localName)) {
        result.push(child);
      } else {
        walk(child);
      }
    }
  };
  walk(root);
  return result;
}

function insertAfter(reference: Element, node: Element): void {
  const parent = reference.parentNode;
  if (!parent) throw new Error('Cannot insert next to a detached element');
  parent.insertBefore(node, reference.nextSibling);
}

function setW(el: Element, name: string, value: string): void {
  el.setAttributeNS(W_NS, `w:${name}`, value);
}

/** A w: attribute by namespace, whatever prefix the part binds it to. */
function getW(el: Element | null, name: string): string | null {
  return el?.getAttributeNS(W_NS, name) || null;
}

function removeW(el: Element, name: string): void {
  if (el.hasAttributeNS(W_NS, name)) el.removeAttributeNS(W_NS, name);
}

function resolveTarget(base: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  return path.posix.normalize(path.posix.join(base, target));
}

function relsPathFor(partPath: string): string {
  return path.posix.join(path.posix.dirname(partPath), '_rels', `${path.posix.basename(partPath)}.rels`);
}

async function findMainDocumentPath(zip: JSZip): Promise<string> {
  const rels = zip.file('_rels/.rels');
  if (!rels) return 'word/document.xml';
  const doc = parseXml(await rels.async('string'), '_rels/.rels');
  const main = elementChildren(doc.documentElement)
    .find(el => el.getAttribute('Type') === REL_TYPES.officeDocument);
  return main ? resolveTarget('', main.getAttribute('Target') ?? 'word/document.xml') : 'word/document.xml';
}

function contentTypeFor(types: Document, partPath: string): string {
  const entries = elementChildren(types.documentElement);
  const override = entries.find(el => el.localName === 'Override' && el.getAttribute('PartName') === `/${partPath}`);
  if (override) return override.getAttribute('ContentType') ?? 'application/octet-stream';
  // extname() treats ".rels" as a dotfile with no extension
  const ext = partPath.slice(partPath.lastIndexOf('.') + 1).toLowerCase();
  const byExtension = entries.find(el => el.localName === 'Default' && (el.getAttribute('Extension') ?? '').toLowerCase() === ext);
  return byExtension?.getAttribute('ContentType') ?? 'application/octet-stream';
}

// ============================================================
// Paragraph helpers
// ============================================================

function paragraphSectPr(paragraph: Element): Element | null {
  const pPr = firstChild(paragraph, 'pPr');
  return pPr ? firstChild(pPr, 'sectPr') : null;
}

function paragraphStyle(paragraph: Element): string | null {
  const pPr = firstChild(paragraph, 'pPr');
  const pStyle = pPr ? firstChild(pPr, 'pStyle') : null;
  return pStyle ? getW(pStyle, 'val') : null;
}

function headingLevel(style: string | null): number | null {
  if (!style) return null;
  if (/^title$/i.test(style)) return 1;
  const match = /^heading\s*(\d)$/i.exec(style);
  return match ? Number(match[1]) : null;
}

/** Visible text: w:t, tabs and line breaks. Deleted text and field codes are skipped. */
function paragraphText(paragraph: Element): string {
  let text = '';
  const walk = (el: Element) => {
    for (const child of elementChildren(el)) {
      if (child.namespaceURI !== W_NS) continue;
      switch (child.localName) {
        case 't':
          text += child.textContent ?? '';
          break;
        case 'tab':
          if (el.localName === 'r') text += '\t';
          break;
        case 'br':
        case 'cr': {
          const type = getW(child, 'type');
          if (!type || type === 'textWrapping') text += '\n';
          break;
        }
        case 'pPr':
        case 'rPr':
        case 'delText':
        case 'instrText':
        case 'txbxContent':
          break;
        default:
          walk(child);
      }
    }
  };
  walk(paragraph);
  return text;
}

/** Drops everything but w:pPr and writes `text` as one run styled like the old first run. */
function replaceParagraphContent(paragraph: Element, text: string): void {
  const doc = paragraph.ownerDocument;
  const firstRun = descendants(paragraph, 'r')[0];
  const runProps = firstRun ? firstChild(firstRun, 'rPr') : null;

  for (const child of Array.from({ length: paragraph.childNodes.length }, (_, i) => paragraph.childNodes.item(i))) {
    if (child && !isW(child, 'pPr')) paragraph.removeChild(child);
  }
  if (text === '') return;

  const run = doc.createElementNS(W_NS, 'w:r');
  if (runProps) run.appendChild(runProps.cloneNode(true));
  for (const piece of text.split(/(\n|\t)/)) {
    if (piece === '') continue;
    if (piece === '\n') {
      run.appendChild(doc.createElementNS(W_NS, 'w:br'));
    } else if (piece === '\t') {
      run.appendChild(doc.createElementNS(W_NS, 'w:tab'));
    } else {
      const t = doc.createElementNS(W_NS, 'w:t');
      t.setAttribute('xml:space', 'preserve');
      t.appendChild(doc.createTextNode(piece));
      run.appendChild(t);
    }
  }
  paragraph.appendChild(run);
}

/**
 * Returns the paragraph's w:pPr child `name`, creating it in schema order when missing.
 * With `replacement`, that element is moved in as the child instead.
 */
function ensurePPrChild(paragraph: Element, name: string, replacement?: Element): Element {
  const doc = paragraph.ownerDocument;
  let pPr = firstChild(paragraph, 'pPr');
  if (!pPr) {
    pPr = doc.createElementNS(W_NS, 'w:pPr');
    paragraph.insertBefore(pPr, paragraph.firstChild);
  }
  const existing = firstChild(pPr, name);
  if (existing && !replacement) return existing;

  const child = replacement ?? doc.createElementNS(W_NS, `w:${name}`);
  if (child.parentNode) child.parentNode.removeChild(child);
  if (existing) {
    pPr.replaceChild(child, existing);
    return child;
  }
  const rank = PPR_ORDER.indexOf(name);
  const next = elementChildren(pPr).find(el => PPR_ORDER.indexOf(el.localName) > rank);
  pPr.insertBefore(child, next ?? null);
  return child;
}

function toTwips(points: number): number {
  return Math.round(points * 20);
}

function fromTwips(value: string | null): number {
  if (!value) return 0;
  const n = Number(value);
  return Number.isFinite(n) ? n / 20 : 0;
}

function readLineRule(value: string | null): LineSpacingRule {
  if (value === 'exact') return 'exactly';
  if (value === 'atLeast') return 'at_least';
  return 'multiple';
}

function readAlignment(value: string | null): Alignment {
  switch (value) {
    case 'center':
      return 'center';
    case 'right':
    case 'end':
      return 'right';
    case 'both':
    case 'distribute':
      return 'justify';
    default:
      return 'left';
  }
}

function readParagraphFormat(paragraph: Element): ParagraphFormat {
  const pPr = firstChild(paragraph, 'pPr');
  const jc = pPr ? firstChild(pPr, 'jc') : null;
  const ind = pPr ? firstChild(pPr, 'ind') : null;
  const spacing = pPr ? firstChild(pPr, 'spacing') : null;

  const hanging = getW(ind, 'hanging');
  const line = getW(spacing, 'line');
  return {
    alignment: readAlignment(getW(jc, 'val')),
    firstLineIndent: hanging ? -fromTwips(hanging) : fromTwips(getW(ind, 'firstLine')),
    leftIndent: fromTwips(getW(ind, 'left') ?? getW(ind, 'start')),
    rightIndent: fromTwips(getW(ind, 'right') ?? getW(ind, 'end')),
    lineSpacing: line ? fromTwips(line) : 12,
    lineSpacingRule: readLineRule(getW(spacing, 'lineRule')),
    beforeSpacing: fromTwips(getW(spacing, 'before')),
    afterSpacing: fromTwips(getW(spacing, 'after')),
  };
}

function replaceInParagraph(paragraph: Element, pattern: RegExp, replacement: string): number {
  // Text nodes with their offsets in the joined paragraph text. Tabs and breaks become
  // an unmatchable separator so a match never spans them.
  const segments: Array<{ node: Element; start: number; text: string }> = [];
  let joined = '';
  const walk = (el: Element) => {
    for (const child of elementChildren(el)) {
      if (child.namespaceURI !== W_NS) continue;
      if (child.localName === 't') {
        const text = child.textContent ?? '';
        segments.push({ node: child, start: joined.length, text });
        joined += text;
      } else if (child.localName === 'tab' || child.localName === 'br' || child.localName === 'cr') {
        joined += SEPARATOR;
      } else if (!['pPr', 'rPr', 'delText', 'instrText', 'txbxContent', 'p'].includes(child.localName)) {
        walk(child);
      }
    }
  };
  walk(paragraph);
  if (segments.length === 0) return 0;

  const matches = [...joined.matchAll(pattern)];
  for (const match of matches.reverse()) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    let first = true;
    for (const segment of segments) {
      const segEnd = segment.start + segment.text.length;
      if (segEnd <= start || segment.start >= end) {
        // A zero-length segment exactly at the match start still takes the replacement.
        if (!(first && segment.text.length === 0 && segment.start === start)) continue;
      }
      const from = Math.max(start - segment.start, 0);
      const to = Math.min(end - segment.start, segment.text.length);
      segment.text = segment.text.slice(0, from) + (first ? replacement : '') + segment.text.slice(to);
      first = false;
      setText(segment.node, segment.text);
    }
  }
  return matches.length;
}

function setText(t: Element, text: string): void {
  while (t.firstChild) t.removeChild(t.firstChild);
  t.appendChild(t.ownerDocument.createTextNode(text));
  t.setAttribute('xml:space', 'preserve');
}

function snapshotTable(table: Element): TableSnapshot {
  const cells = elementChildren(table)
    .filter(el => isW(el, 'tr'))
    .map(row => elementChildren(row)
      .filter(el => isW(el, 'tc'))
      .map(cell => elementChildren(cell).filter(el => isW(el, 'p')).map(paragraphText).join('\n')));
  const columns = cells.length > 0 ? cells[0].length : 0;
  return { rows: cells.length, columns, cells };
}

function styleId(name: string): string {
  return name.replace(/\s+/g, '');
}

function containsWatermark(paragraph: Element): boolean {
  const shapes = paragraph.getElementsByTagNameNS(V_NS, 'shape');
  for (let i = 0; i < shapes.length; i++) {
    if ((shapes.item(i)?.getAttribute('id') ?? '').startsWith(WATERMARK_SHAPE_PREFIX)) return true;
  }
  return false;
}

function cleanMergedContent(root: Element): void {
  for (const name of MERGE_DROPPED_ELEMENTS) {
    for (const el of collect(root, name)) el.parentNode?.removeChild(el);
  }
  for (const link of collect(root, 'hyperlink')) {
    const parent = link.parentNode;
    if (!parent) continue;
    while (link.firstChild) parent.insertBefore(link.firstChild, link);
    parent.removeChild(link);
  }
}

function collect(root: Element, localName: string): Element[] {
  const found: Element[] = isW(root, localName) ? [root] : [];
  const list = root.getElementsByTagNameNS(W_NS, localName);
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) found.push(el);
  }
  return found;
}

/** ECMA-376 password hash: SHA-512 over salt + UTF-16LE password, then `spinCount` rounds. */
export function hashPassword(password: string, salt: Buffer, spinCount: number): Buffer {
  let hash = crypto.createHash('sha512').update(Buffer.concat([salt, Buffer.from(password, 'utf16le')])).digest();
  const iterator = Buffer.alloc(4);
  for (let i = 0; i < spinCount; i++) {
    iterator.writeUInt32LE(i, 0);
    hash = crypto.createHash('sha512').update(Buffer.concat([hash, iterator])).digest();
  }
  return hash;
}
