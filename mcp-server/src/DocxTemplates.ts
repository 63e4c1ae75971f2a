// ============================================================
// Package part templates for new documents and generated parts
// ============================================================

export const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
export const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
export const PKG_REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
export const CONTENT_TYPES_NS = 'http://schemas.openxmlformats.org/package/2006/content-types';
export const V_NS = 'urn:schemas-microsoft-com:vml';
export const O_NS = 'urn:schemas-microsoft-com:office:office';
export const W10_NS = 'urn:schemas-microsoft-com:office:word';

export const REL_TYPES = {
  officeDocument: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  styles: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles',
  settings: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/settings',
  header: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/header',
  coreProperties: 'http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties',
  extendedProperties: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/extended-properties',
  vbaProject: 'http://schemas.microsoft.com/office/2006/relationships/vbaProject',
} as const;

export const CONTENT_TYPE = {
  document: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml',
  styles: 'application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml',
  settings: 'application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml',
  header: 'application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml',
  core: 'application/vnd.openxmlformats-package.core-properties+xml',
  app: 'application/vnd.openxmlformats-officedocument.extended-properties+xml',
  relationships: 'application/vnd.openxmlformats-package.relationships+xml',
  vbaProject: 'application/vnd.ms-office.vbaProject',
} as const;

/** Main-part content type for each editable package extension. */
export const MAIN_CONTENT_TYPES: Record<string, string> = {
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml',
  '.dotx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.template.main+xml',
  '.docm': 'application/vnd.ms-word.document.macroEnabled.main+xml',
  '.dotm': 'application/vnd.ms-word.template.macroEnabledTemplate.main+xml',
};

/** Extensions whose packages may carry a VBA project. */
export const MACRO_ENABLED_EXTENSIONS: ReadonlySet<string> = new Set(['.docm', '.dotm']);

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

/** Namespace declarations every generated part root carries. */
export const PART_NAMESPACES =
  `xmlns:w="${W_NS}" xmlns:r="${R_NS}" xmlns:v="${V_NS}" xmlns:o="${O_NS}" xmlns:w10="${W10_NS}"`;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export const CONTENT_TYPES_XML = `${XML_DECLARATION}
<Types xmlns="${CONTENT_TYPES_NS}"><Default Extension="rels" ContentType="${CONTENT_TYPE.relationships}"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/word/document.xml" ContentType="${CONTENT_TYPE.document}"/><Override PartName="/word/styles.xml" ContentType="${CONTENT_TYPE.styles}"/><Override PartName="/word/settings.xml" ContentType="${CONTENT_TYPE.settings}"/><Override PartName="/docProps/core.xml" ContentType="${CONTENT_TYPE.core}"/><Override PartName="/docProps/app.xml" ContentType="${CONTENT_TYPE.app}"/></Types>`;

export const ROOT_RELS_XML = `${XML_DECLARATION}
<Relationships xmlns="${PKG_REL_NS}"><Relationship Id="rId1" Type="${REL_TYPES.officeDocument}" Target="word/document.xml"/><Relationship Id="rId2" Type="${REL_TYPES.coreProperties}" Target="docProps/core.xml"/><Relationship Id="rId3" Type="${REL_TYPES.extendedProperties}" Target="docProps/app.xml"/></Relationships>`;

export const DOCUMENT_RELS_XML = `${XML_DECLARATION}
<Relationships xmlns="${PKG_REL_NS}"><Relationship Id="rId1" Type="${REL_TYPES.styles}" Target="styles.xml"/><Relationship Id="rId2" Type="${REL_TYPES.settings}" Target="settings.xml"/></Relationships>`;

// US Letter, one-inch margins.
export const DEFAULT_SECTION_PROPERTIES =
  '<w:sectPr><w:pgSz w:w="12240" w:h="15840"/><w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/><w:cols w:space="720"/></w:sectPr>';

export const DOCUMENT_XML = `${XML_DECLARATION}
<w:document ${PART_NAMESPACES}><w:body>${DEFAULT_SECTION_PROPERTIES}</w:body></w:document>`;

export const SETTINGS_XML = `${XML_DECLARATION}
<w:settings xmlns:w="${W_NS}"><w:zoom w:percent="100"/><w:defaultTabStop w:val="720"/><w:characterSpacingControl w:val="doNotCompress"/><w:compat><w:compatSetting w:name="compatibilityMode" w:uri="http://schemas.microsoft.com/office/word" w:val="15"/></w:compat></w:settings>`;

export const STYLES_XML = `${XML_DECLARATION}
<w:styles xmlns:w="${W_NS}"><w:docDefaults><w:rPrDefault><w:rPr><w:rFonts w:ascii="Calibri" w:hAnsi="Calibri" w:eastAsia="Calibri" w:cs="Calibri"/><w:sz w:val="22"/><w:szCs w:val="22"/><w:lang w:val="en-US"/></w:rPr></w:rPrDefault><w:pPrDefault/></w:docDefaults>`
  + `<w:style w:type="paragraph" w:default="1" w:styleId="Normal"><w:name w:val="Normal"/><w:qFormat/></w:style>`
  + headingStyle(1, 32) + headingStyle(2, 26) + headingStyle(3, 24)
  + `<w:style w:type="paragraph" w:styleId="Title"><w:name w:val="Title"/><w:basedOn w:val="Normal"/><w:next w:val="Normal"/><w:qFormat/><w:rPr><w:sz w:val="56"/><w:szCs w:val="56"/></w:rPr></w:style>`
  + `<w:style w:type="paragraph" w:styleId="Subtitle"><w:name w:val="Subtitle"/><w:basedOn w:val="Normal"/><w:next w:val="Normal"/><w:qFormat/><w:rPr><w:color w:val="5A5A5A"/></w:rPr></w:style>`
  + `<w:style w:type="paragraph" w:styleId="Header"><w:name w:val="header"/><w:basedOn w:val="Normal"/><w:pPr><w:tabs><w:tab w:val="center" w:pos="4680"/><w:tab w:val="right" w:pos="9360"/></w:tabs></w:pPr></w:style>`
  + `<w:style w:type="table" w:default="1" w:styleId="TableNormal"><w:name w:val="Normal Table"/><w:tblPr><w:tblInd w:w="0" w:type="dxa"/><w:tblCellMar><w:top w:w="0" w:type="dxa"/><w:left w:w="108" w:type="dxa"/><w:bottom w:w="0" w:type="dxa"/><w:right w:w="108" w:type="dxa"/></w:tblCellMar></w:tblPr></w:style>`
  + `<w:style w:type="table" w:styleId="TableGrid"><w:name w:val="Table Grid"/><w:basedOn w:val="TableNormal"/><w:tblPr><w:tblBorders>${borders('single', 4)}</w:tblBorders></w:tblPr></w:style>`
  + `</w:styles>`;

function headingStyle(level: number, halfPoints: number): string {
  return `<w:style w:type="paragraph" w:styleId="Heading${level}"><w:name w:val="heading ${level}"/><w:basedOn w:val="Normal"/><w:next w:val="Normal"/><w:qFormat/>`
    + `<w:pPr><w:keepNext/><w:spacing w:before="240" w:after="60"/><w:outlineLvl w:val="${level - 1}"/></w:pPr>`
    + `<w:rPr><w:b/><w:sz w:val="${halfPoints}"/><w:szCs w:val="${halfPoints}"/></w:rPr></w:style>`;
}

export function borders(kind: string, size: number): string {
  return ['top', 'left', 'bottom', 'right', 'insideH', 'insideV']
    .map(side => `<w:${side} w:val="${kind}" w:sz="${size}" w:space="0" w:color="auto"/>`)
    .join('');
}

export function coreXml(now: string): string {
  return `${XML_DECLARATION}
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"><dc:title></dc:title><dc:creator>docx-mcp-server</dc:creator><dcterms:created xsi:type="dcterms:W3CDTF">${now}</dcterms:created><dcterms:modified xsi:type="dcterms:W3CDTF">${now}</dcterms:modified></cp:coreProperties>`;
}

export const APP_XML = `${XML_DECLARATION}
<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/extended-properties"><Application>docx-mcp-server</Application></Properties>`;

export function headerXml(paragraphs: string): string {
  return `${XML_DECLARATION}
<w:hdr ${PART_NAMESPACES}>${paragraphs}</w:hdr>`;
}

// VML text-path shape type used by Word for WordArt watermarks.
const TEXT_PATH_SHAPETYPE =
  '<v:shapetype id="_x0000_t136" coordsize="21600,21600" o:spt="136" adj="10800" path="m@7,l@8,m@5,21600l@6,21600e">'
  + '<v:formulas><v:f eqn="sum #0 0 10800"/><v:f eqn="prod #0 2 1"/><v:f eqn="sum 21600 0 @1"/><v:f eqn="sum 0 0 @2"/><v:f eqn="sum 21600 0 @3"/><v:f eqn="if @0 @3 0"/><v:f eqn="if @0 21600 @1"/><v:f eqn="if @0 0 @2"/><v:f eqn="if @0 @4 21600"/><v:f eqn="mid @5 @6"/><v:f eqn="mid @8 @5"/><v:f eqn="mid @7 @8"/><v:f eqn="mid @6 @7"/><v:f eqn="sum @6 0 @5"/></v:formulas>'
  + '<v:path textpathok="t" o:connecttype="custom" o:connectlocs="@9,0;@10,10800;@11,21600;@12,10800" o:connectangles="270,180,90,0"/>'
  + '<v:textpath on="t" fitshape="t"/><v:handles><v:h position="#0,bottomRight" xrange="6629,14971"/></v:handles><o:lock v:ext="edit" text="t" shapetype="t"/></v:shapetype>';

export const WATERMARK_SHAPE_PREFIX = 'PowerPlusWaterMarkObject';

export interface WatermarkOptions {
  text: string;
  fontSize: number;
  /** `#RRGGBB` */
  color: string;
}

export function watermarkParagraphXml(options: WatermarkOptions, shapeNumber: number): string {
  const text = escapeXml(options.text);
  return `<w:p><w:pPr><w:pStyle w:val="Header"/></w:pPr><w:r><w:rPr><w:noProof/></w:rPr><w:pict>${TEXT_PATH_SHAPETYPE}`
    + `<v:shape id="${WATERMARK_SHAPE_PREFIX}${shapeNumber}" o:spid="_x0000_s${2048 + shapeNumber}" type="#_x0000_t136" `
    + `style="position:absolute;margin-left:0;margin-top:0;width:468pt;height:117pt;rotation:315;z-index:-251657216;mso-position-horizontal:center;mso-position-horizontal-relative:margin;mso-position-vertical:center;mso-position-vertical-relative:margin" `
    + `o:allowincell="f" fillcolor="${options.color}" stroked="f">`
    + `<v:fill opacity=".5"/><v:textpath style="font-family:&quot;Calibri&quot;;font-size:${options.fontSize}pt" string="${text}"/>`
    + `<w10:wrap anchorx="margin" anchory="margin"/></v:shape></w:pict></w:r></w:p>`;
}

/** Wraps body-level XML so it can be parsed on its own and imported into a part. */
export function fragmentXml(inner: string): string {
  return `<w:fragment ${PART_NAMESPACES}>${inner}</w:fragment>`;
}
