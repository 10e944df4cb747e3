/** Text layer of a PDF; empty for scans. Throws on corrupt documents. */
export async function readPdfText(bytes: Buffer): Promise<string> {
  // loaded on first use: the package reads a bundled sample file when imported eagerly
  const { default: pdfParse } = await import('pdf-parse');
  const { text } = await pdfParse(bytes);
  return text ?? '';
}
