/**
 * Vendor payload schemas and their translation into retrieval types.
 *
 * Every OpenAI response the gateway hands back is validated here before any
 * field is read. Fields the vendor may omit are declared optional and given
 * the fallbacks documented on each translation function, so schema drift on
 * the vendor side only ever touches this module.
 */

import { z } from 'zod';

import { BackendError } from '../errors/retrieval-errors';
import { type Document, type SearchResult } from '../types';

const FILE_URL_BASE = 'https://platform.openai.com/storage/files/';
const TITLE_MAX_LENGTH = 80;
const EMPTY_DOCUMENT_TEXT = 'No extractable text content.';

// Matches assistant citation markers such as 【4:0†feline_ethology.pdf】
const CITATION_MARKER = /【[^】]*】/g;

const attributesSchema = z
  .record(z.union([z.string(), z.number(), z.boolean()]))
  .nullish()
  .transform((value): Record<string, string | number | boolean> => value ?? {});

const textChunkSchema = z.object({
  type: z.string().optional(),
  text: z.string().optional(),
});

const annotationSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  start_index: z.number().int().nonnegative().optional(),
  end_index: z.number().int().nonnegative().optional(),
  file_citation: z.object({ file_id: z.string().min(1) }).optional(),
});

const messageContentSchema = z.object({
  type: z.string(),
  text: z
    .object({
      value: z.string(),
      annotations: z.array(annotationSchema).default([]),
    })
    .optional(),
});

export const assistantMessagesSchema = z.array(
  z.object({
    id: z.string().optional(),
    role: z.string(),
    content: z.array(messageContentSchema).default([]),
  }),
);

export const vectorStoreSearchSchema = z.array(
  z.object({
    file_id: z.string().min(1),
    filename: z.string().optional(),
    score: z.number().optional(),
    attributes: attributesSchema,
    content: z.array(textChunkSchema).default([]),
  }),
);

export const fileObjectSchema = z.object({
  id: z.string().min(1),
  filename: z.string().optional(),
  purpose: z.string().optional(),
  bytes: z.number().nullish(),
  created_at: z.number().optional(),
});

export const vectorStoreFileSchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
  attributes: attributesSchema,
});

export const fileContentSchema = z.array(textChunkSchema);

export type FileObject = z.infer<typeof fileObjectSchema>;
export type VectorStoreFile = z.infer<typeof vectorStoreFileSchema>;

/**
 * A single file citation pulled out of an assistant answer
 */
export interface CitedExcerpt {
  fileId: string;
  excerpt: string;
}

export interface NormalizationOptions {
  snippetLength: number;
}

/**
 * Validate a raw vendor payload, turning schema mismatches into BackendError
 */
export function parseVendorPayload<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  description: string,
): z.output<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new BackendError(`Malformed vendor payload: ${description}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function truncateText(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function cleanExcerpt(text: string): string {
  return text.replace(CITATION_MARKER, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Placeholder url for files that carry no `url` attribute
 */
export function fileUrl(fileId: string): string {
  return `${FILE_URL_BASE}${encodeURIComponent(fileId)}`;
}

function joinChunks(chunks: Array<z.infer<typeof textChunkSchema>>): string {
  return chunks
    .map((chunk) => chunk.text ?? '')
    .filter((text) => text.trim().length > 0)
    .join('\n\n');
}

function stringAttribute(
  attributes: Record<string, string | number | boolean>,
  key: string,
): string | undefined {
  const value = attributes[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * Title fallback chain: explicit title, filename, start of the text, id
 */
function deriveTitle(
  id: string,
  text: string,
  filename?: string,
  explicitTitle?: string,
): string {
  if (explicitTitle) return explicitTitle;
  if (filename && filename.trim()) return filename;
  const fromText = cleanExcerpt(text);
  return fromText ? truncateText(fromText, TITLE_MAX_LENGTH) : id;
}

/**
 * Walk the annotations of one text block and attach to each file citation the
 * answer text written since the previous annotation. A citation directly after
 * another one shares its excerpt; a citation with nothing before it gets the
 * whole answer.
 */
function excerptsFromText(
  value: string,
  annotations: Array<z.infer<typeof annotationSchema>>,
): CitedExcerpt[] {
  const citations: CitedExcerpt[] = [];
  let cursor = 0;
  let previousExcerpt = '';

  for (const annotation of annotations) {
    const start = Math.max(cursor, annotation.start_index ?? cursor);
    const fileId = annotation.file_citation?.file_id;

    if (annotation.type === 'file_citation' && fileId) {
      const excerpt =
        cleanExcerpt(value.slice(cursor, start)) || previousExcerpt || cleanExcerpt(value);
      citations.push({ fileId, excerpt });
      previousExcerpt = excerpt;
    }

    cursor = Math.max(start, annotation.end_index ?? start);
  }

  return citations;
}

/**
 * Extract file citations, in answer order, from the messages of an assistant run
 */
export function extractCitations(messages: unknown): CitedExcerpt[] {
  const parsed = parseVendorPayload(assistantMessagesSchema, messages, 'assistant messages');

  return parsed
    .filter((message) => message.role === 'assistant')
    .flatMap((message) => message.content)
    .flatMap((content) =>
      content.type === 'text' && content.text
        ? excerptsFromText(content.text.value, content.text.annotations)
        : [],
    );
}

/**
 * One search result per citation. Titles come from the cited file's name when
 * it could be resolved.
 */
export function toAssistantSearchResults(
  citations: CitedExcerpt[],
  files: ReadonlyMap<string, FileObject>,
  options: NormalizationOptions,
): SearchResult[] {
  return citations.map(({ fileId, excerpt }) => {
    const filename = files.get(fileId)?.filename;
    const title = deriveTitle(fileId, excerpt, filename);
    return {
      id: fileId,
      title,
      text: excerpt ? truncateText(excerpt, options.snippetLength) : title,
      url: fileUrl(fileId),
    };
  });
}

/**
 * One search result per vector store hit, keeping the backend's ranking
 */
export function toVectorStoreSearchResults(
  page: unknown,
  options: NormalizationOptions,
): SearchResult[] {
  const hits = parseVendorPayload(vectorStoreSearchSchema, page, 'vector store search results');

  return hits.map((hit) => {
    const text = joinChunks(hit.content);
    const title = deriveTitle(
      hit.file_id,
      text,
      hit.filename,
      stringAttribute(hit.attributes, 'title'),
    );
    return {
      id: hit.file_id,
      title,
      text: text ? truncateText(text, options.snippetLength) : title,
      url: stringAttribute(hit.attributes, 'url') ?? fileUrl(hit.file_id),
    };
  });
}

/**
 * Assemble a full document from the file record, its vector store entry and
 * its parsed content
 */
export function toDocument(
  id: string,
  payloads: { file: unknown; vectorStoreFile: unknown; content: unknown },
): Document {
  const file = parseVendorPayload(fileObjectSchema, payloads.file, 'file object');
  const vectorStoreFile = parseVendorPayload(
    vectorStoreFileSchema,
    payloads.vectorStoreFile,
    'vector store file',
  );
  const chunks = parseVendorPayload(fileContentSchema, payloads.content, 'file content');

  const text = joinChunks(chunks);
  const metadata: Record<string, string> = {};

  if (file.filename) metadata.filename = file.filename;
  if (file.purpose) metadata.purpose = file.purpose;
  if (typeof file.bytes === 'number') metadata.bytes = String(file.bytes);
  if (typeof file.created_at === 'number') {
    metadata.created_at = new Date(file.created_at * 1000).toISOString();
  }
  for (const [key, value] of Object.entries(vectorStoreFile.attributes)) {
    metadata[key] = String(value);
  }

  return {
    id,
    title: deriveTitle(
      id,
      text,
      file.filename,
      stringAttribute(vectorStoreFile.attributes, 'title'),
    ),
    text: text || EMPTY_DOCUMENT_TEXT,
    url: stringAttribute(vectorStoreFile.attributes, 'url') ?? fileUrl(id),
    metadata,
  };
}
