import { PDFDocument } from "pdf-lib";
import pdfParse from "pdf-parse";
import { errorMessage } from "../errors";

export interface DocumentCodec {
  /** Text of every page, in page order. */
  readPageTexts(content: Uint8Array): Promise<string[]>;
  /** New document holding only the given 0-based pages. */
  extractPages(content: Uint8Array, pages: number[]): Promise<Uint8Array>;
  readText(content: Uint8Array): Promise<string>;
}

export class PdfCodec implements DocumentCodec {
  async readPageTexts(content: Uint8Array): Promise<string[]> {
    const source = await this.load(content);
    const texts: string[] = [];

    // pdf-parse only returns the concatenated text, so pages are read one at a time.
    for (const index of source.getPageIndices()) {
      const single = await this.copyPages(source, [index]);
      texts.push(await this.readText(single));
    }

    return texts;
  }

  async extractPages(content: Uint8Array, pages: number[]): Promise<Uint8Array> {
    const source = await this.load(content);
    return this.copyPages(source, pages);
  }

  async readText(content: Uint8Array): Promise<string> {
    try {
      const parsed = await pdfParse(Buffer.from(content));
      return parsed.text.trim();
    } catch (error) {
      throw new Error(`Unable to read PDF text: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async load(content: Uint8Array): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(content);
    } catch (error) {
      throw new Error(`Unable to open PDF: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async copyPages(source: PDFDocument, pages: number[]): Promise<Uint8Array> {
    const pageCount = source.getPageCount();
    const outOfRange = pages.find((page) => !Number.isInteger(page) || page < 0 || page >= pageCount);
    if (outOfRange !== undefined) {
      throw new Error(`Page ${outOfRange} is out of range for a ${pageCount}-page document`);
    }

    const target = await PDFDocument.create();
    const copied = await target.copyPages(source, pages);
    for (const page of copied) {
      target.addPage(page);
    }
    return target.save();
  }
}
