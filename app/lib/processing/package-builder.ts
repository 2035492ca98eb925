import JSZip from "jszip";
import { writeFile } from "fs/promises";
import { v4 as uuid } from "uuid";
import { PackageError } from "./errors";
import { escapeHtml } from "./utils";

export interface ImageAsset {
  id: string;
  /** Path relative to the content directory, as written in src attributes */
  href: string;
  mediaType: string;
  data: Buffer;
}

export interface CoverAsset {
  href: string;
  mediaType: string;
  data: Buffer;
}

export interface ContentPage {
  id: string;
  href: string;
  title: string;
  /** Body markup; the builder supplies the surrounding document */
  markup: string;
}

export interface NavEntry {
  uid: string;
  pageId: string;
  title: string;
}

export interface PackageMetadata {
  title: string;
  language: string;
  author?: string;
  identifier?: string;
  modified?: Date;
}

/**
 * The operations the conversion pipeline needs from an e-book container.
 * Keeps the container format out of segmentation and substitution.
 */
export interface PackageBuilder {
  setMetadata(metadata: PackageMetadata): void;
  addImage(image: ImageAsset): void;
  addPage(page: ContentPage): void;
  setReadingOrder(pageIds: string[]): void;
  setCover(cover: CoverAsset): void;
  setNavigation(entries: NavEntry[]): void;
  toBuffer(): Promise<Buffer>;
  writeTo(filePath: string): Promise<void>;
}

const STYLESHEET = `body {
  font-family: serif;
  line-height: 1.6;
  margin: 1em;
}
h1 {
  line-height: 1.3;
  margin-top: 1.5em;
  margin-bottom: 0.5em;
}
p {
  margin: 0.5em 0;
}
img {
  max-width: 100%;
  height: auto;
}
`;

/**
 * EPUB 3 package assembled with JSZip. Carries both an EPUB 3 navigation
 * document and an EPUB 2 NCX so older readers get a table of contents.
 */
export class EpubPackageBuilder implements PackageBuilder {
  private metadata: PackageMetadata = { title: "Untitled", language: "en" };
  private images: ImageAsset[] = [];
  private pages: ContentPage[] = [];
  private readingOrder: string[] = [];
  private navigation: NavEntry[] = [];
  private cover: CoverAsset | null = null;

  setMetadata(metadata: PackageMetadata): void {
    this.metadata = metadata;
  }

  addImage(image: ImageAsset): void {
    if (this.images.some((img) => img.id === image.id || img.href === image.href)) {
      throw new PackageError(`Duplicate image asset: ${image.href}`);
    }
    this.images.push(image);
  }

  addPage(page: ContentPage): void {
    if (this.pages.some((p) => p.id === page.id || p.href === page.href)) {
      throw new PackageError(`Duplicate page: ${page.href}`);
    }
    this.pages.push(page);
  }

  setReadingOrder(pageIds: string[]): void {
    this.readingOrder = [...pageIds];
  }

  setCover(cover: CoverAsset): void {
    this.cover = cover;
  }

  setNavigation(entries: NavEntry[]): void {
    this.navigation = [...entries];
  }

  async toBuffer(): Promise<Buffer> {
    this.validate();

    const zip = new JSZip();
    const { title, language, author } = this.metadata;
    const identifier = this.metadata.identifier ?? `urn:uuid:${uuid()}`;
    const modified = (this.metadata.modified ?? new Date()).toISOString().replace(/\.\d{3}Z$/, "Z");

    // mimetype must be first and uncompressed
    zip.file("mimetype", "application/epub+zip", { compression: "STORE" });

    zip.file(
      "META-INF/container.xml",
      `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`,
    );

    zip.file("OEBPS/styles.css", STYLESHEET);

    if (this.cover) {
      zip.file(`OEBPS/${decodeURIComponent(this.cover.href)}`, this.cover.data);
    }
    for (const img of this.images) {
      zip.file(`OEBPS/${decodeURIComponent(img.href)}`, img.data);
    }
    for (const page of this.pages) {
      zip.file(`OEBPS/${page.href}`, renderPage(page, language));
    }

    const manifestItems = [
      `    <item id="styles" href="styles.css" media-type="text/css"/>`,
      `    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>`,
      `    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
      ...(this.cover
        ? [
            `    <item id="cover-image" href="${this.cover.href}" media-type="${this.cover.mediaType}" properties="cover-image"/>`,
          ]
        : []),
      ...this.images.map(
        (img) => `    <item id="${img.id}" href="${img.href}" media-type="${img.mediaType}"/>`,
      ),
      ...this.pages.map(
        (p) => `    <item id="${p.id}" href="${p.href}" media-type="application/xhtml+xml"/>`,
      ),
    ].join("\n");

    const spineItems = this.readingOrder.map((id) => `    <itemref idref="${id}"/>`).join("\n");

    zip.file(
      "OEBPS/content.opf",
      `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="bookid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="bookid">${escapeHtml(identifier)}</dc:identifier>
    <dc:title>${escapeHtml(title)}</dc:title>
${author ? `    <dc:creator>${escapeHtml(author)}</dc:creator>\n` : ""}    <dc:language>${escapeHtml(language)}</dc:language>
    <meta property="dcterms:modified">${modified}</meta>
${this.cover ? `    <meta name="cover" content="cover-image"/>\n` : ""}  </metadata>
  <manifest>
${manifestItems}
  </manifest>
  <spine toc="ncx">
${spineItems}
  </spine>
</package>`,
    );

    const navTargets = this.navigation.map((entry) => ({ entry, href: this.pageHref(entry.pageId) }));

    zip.file(
      "OEBPS/nav.xhtml",
      `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" xml:lang="${escapeHtml(language)}">
<head>
  <title>${escapeHtml(title)}</title>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <h1>${escapeHtml(title)}</h1>
    <ol>
${navTargets.map(({ entry, href }) => `      <li><a href="${href}">${escapeHtml(entry.title)}</a></li>`).join("\n")}
    </ol>
  </nav>
</body>
</html>`,
    );

    zip.file(
      "OEBPS/toc.ncx",
      `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeHtml(identifier)}"/>
    <meta name="dtb:depth" content="1"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle>
    <text>${escapeHtml(title)}</text>
  </docTitle>
  <navMap>
${navTargets
  .map(
    ({ entry, href }, i) => `    <navPoint id="${entry.uid}" playOrder="${i + 1}">
      <navLabel>
        <text>${escapeHtml(entry.title)}</text>
      </navLabel>
      <content src="${href}"/>
    </navPoint>`,
  )
  .join("\n")}
  </navMap>
</ncx>`,
    );

    return zip.generateAsync({
      type: "nodebuffer",
      mimeType: "application/epub+zip",
      compression: "DEFLATE",
      compressionOptions: { level: 6 },
    });
  }

  async writeTo(filePath: string): Promise<void> {
    const buffer = await this.toBuffer();
    await writeFile(filePath, buffer);
  }

  private pageHref(pageId: string): string {
    const page = this.pages.find((p) => p.id === pageId);
    if (!page) {
      throw new PackageError(`Unknown page: ${pageId}`);
    }
    return page.href;
  }

  private validate(): void {
    for (const id of this.readingOrder) {
      this.pageHref(id);
    }
    for (const entry of this.navigation) {
      this.pageHref(entry.pageId);
    }

    const embedded = new Set(this.images.map((img) => img.href));
    if (this.cover) {
      embedded.add(this.cover.href);
    }
    for (const page of this.pages) {
      for (const match of page.markup.matchAll(/\bsrc="([^"]*)"/g)) {
        if (!embedded.has(match[1])) {
          throw new PackageError(`Page ${page.href} references missing image ${match[1]}`);
        }
      }
    }
  }
}

function renderPage(page: ContentPage, language: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xml:lang="${escapeHtml(language)}">
<head>
  <title>${escapeHtml(page.title)}</title>
  <link rel="stylesheet" type="text/css" href="styles.css"/>
</head>
<body>
${page.markup}
</body>
</html>`;
}
