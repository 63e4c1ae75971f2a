/**
 * Hand-built WordprocessingML packages for tests.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { R_NS, W_NS } from './DocxTemplates';
import type { ConversionHistoryStore } from './ConversionHistoryStore';
import type { OfficeConverter } from './LibreOfficeRunner';
import { createDispatcher } from './server';
import type { ToolDispatcher } from './ToolDispatcher';

export const SECTION_PROPERTIES = '<w:sectPr><w:pgSz w:w="12240" w:h="15840"/><w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/></w:sectPr>';

/**
 * Two sections. Section 0: a heading, a paragraph split over four runs, a 2x2 table and
 * a paragraph carrying the section break. Section 1: a paragraph with a line break and a
 * tab, and one with deleted text.
 */
export const REPORT_BODY = [
  '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t>Quarterly Report</w:t></w:r></w:p>',
  '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Sales </w:t></w:r><w:r><w:t>gr</w:t></w:r><w:r><w:t>ew</w:t></w:r><w:r><w:t xml:space="preserve"> fast</w:t></w:r></w:p>',
  '<w:tbl><w:tblPr><w:tblW w:w="0" w:type="auto"/></w:tblPr><w:tblGrid><w:gridCol w:w="4680"/><w:gridCol w:w="4680"/></w:tblGrid>'
    + '<w:tr><w:tc><w:p><w:r><w:t>A1</w:t></w:r></w:p></w:tc><w:tc><w:p><w:r><w:t>B1</w:t></w:r></w:p></w:tc></w:tr>'
    + '<w:tr><w:tc><w:p><w:r><w:t>A2</w:t></w:r></w:p></w:tc><w:tc><w:p><w:r><w:t>B2</w:t></w:r></w:p></w:tc></w:tr></w:tbl>',
  `<w:p><w:pPr>${SECTION_PROPERTIES}</w:pPr><w:r><w:t>End of part one</w:t></w:r></w:p>`,
  '<w:p><w:r><w:t>Line one</w:t><w:br/><w:t>Line two</w:t><w:tab/><w:t>tabbed</w:t></w:r></w:p>',
  '<w:p><w:r><w:delText>gone</w:delText></w:r><w:r><w:t>kept</w:t></w:r></w:p>',
  SECTION_PROPERTIES,
].join('');

export interface FixtureOptions {
  /** Inner XML of w:settings. */
  settings?: string;
  /** Inner XML of w:styles; the package has no styles part without it. */
  styles?: string;
  /** Builds a macro-enabled package carrying a VBA project. */
  vbaProject?: boolean;
}

const XML_HEAD = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
const REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';

export async function buildDocx(bodyXml: string, options: FixtureOptions = {}): Promise<Buffer> {
  const zip = new JSZip();
  const mainType = options.vbaProject
    ? 'application/vnd.ms-word.document.macroEnabled.main+xml'
    : 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml';
  const documentRels = ['<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/settings" Target="settings.xml"/>'];
  const overrides = [
    `<Override PartName="/word/document.xml" ContentType="${mainType}"/>`,
    '<Override PartName="/word/settings.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml"/>',
  ];
  const defaults = [
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>',
    '<Default Extension="xml" ContentType="application/xml"/>',
  ];

  if (options.styles !== undefined) {
    documentRels.push('<Relationship Id="rId2" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/>');
    overrides.push('<Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>');
    zip.file('word/styles.xml', `${XML_HEAD}<w:styles xmlns:w="${W_NS}">${options.styles}</w:styles>`);
  }
  if (options.vbaProject) {
    documentRels.push('<Relationship Id="rId9" Type="http://schemas.microsoft.com/office/2006/relationships/vbaProject" Target="vbaProject.bin"/>');
    defaults.push('<Default Extension="bin" ContentType="application/vnd.ms-office.vbaProject"/>');
    overrides.push('<Override PartName="/word/vbaData.xml" ContentType="application/vnd.ms-word.vbaData+xml"/>');
    zip.file('word/vbaProject.bin', Buffer.from('not really a compound file'));
    zip.file('word/_rels/vbaProject.bin.rels', `${XML_HEAD}<Relationships xmlns="${REL_NS}">`
      + '<Relationship Id="rId1" Type="http://schemas.microsoft.com/office/2006/relationships/wordVbaData" Target="vbaData.xml"/>'
      + '</Relationships>');
    zip.file('word/vbaData.xml', `${XML_HEAD}<wne:vbaSuppData xmlns:wne="http://schemas.microsoft.com/office/word/2006/wordml"/>`);
  }

  zip.file('[Content_Types].xml', `${XML_HEAD}<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">`
    + defaults.join('') + overrides.join('') + '</Types>');
  zip.file('_rels/.rels', `${XML_HEAD}<Relationships xmlns="${REL_NS}">`
    + '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>'
    + '</Relationships>');
  zip.file('word/_rels/document.xml.rels', `${XML_HEAD}<Relationships xmlns="${REL_NS}">${documentRels.join('')}</Relationships>`);
  zip.file('word/settings.xml', XML_HEAD
    + `<w:settings xmlns:w="${W_NS}">${options.settings ?? '<w:zoom w:percent="100"/><w:defaultTabStop w:val="720"/>'}</w:settings>`);
  zip.file('word/document.xml', XML_HEAD
    + `<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${bodyXml}</w:body></w:document>`);
  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function readPart(data: Buffer, partPath: string): Promise<string> {
  const zip = await JSZip.loadAsync(data);
  const file = zip.file(partPath);
  if (!file) throw new Error(`${partPath} is missing`);
  return file.async('string');
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'docx-mcp-test-'));
}

/** Stands in for LibreOffice: writes a marker file, or fails when told to. */
export class FakeOfficeConverter implements OfficeConverter {
  readonly calls: Array<{ sourcePath: string; format: string; outputPath: string }> = [];
  failWith: string | null = null;

  async convert(sourcePath: string, format: string, outputPath: string): Promise<void> {
    this.calls.push({ sourcePath, format, outputPath });
    if (this.failWith) throw new Error(this.failWith);
    fs.writeFileSync(outputPath, `converted to ${format}`);
  }
}

export interface TestWorkspace {
  dir: string;
  office: FakeOfficeConverter;
  dispatcher: ToolDispatcher;
  /** Absolute path of a document in the workspace. */
  file(name: string): string;
  /** Writes a hand-built document into the workspace. */
  put(name: string, bodyXml?: string, options?: FixtureOptions): Promise<string>;
  cleanup(): void;
}

export function createWorkspace(history?: ConversionHistoryStore): TestWorkspace {
  const dir = makeTempDir();
  const office = new FakeOfficeConverter();
  const dispatcher = createDispatcher({
    config: { wordFilesPath: dir, sofficePath: 'soffice', conversionTimeoutMs: 1000 },
    office,
    history,
  });
  return {
    dir,
    office,
    dispatcher,
    file: name => path.join(dir, name),
    put: async (name, bodyXml = REPORT_BODY, options = {}) => {
      const filePath = path.join(dir, name);
      fs.writeFileSync(filePath, await buildDocx(bodyXml, options));
      return filePath;
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
