import { z } from "zod";

export const DocumentDescriptionSchema = z.object({
  participantInn: z.string().optional(),
});

export const ProductSchema = z.object({
  certificateDocument: z.string().optional(),
  certificateDocumentDate: z.string().optional(),
  certificateDocumentNumber: z.string().optional(),
  ownerInn: z.string().optional(),
  producerInn: z.string().optional(),
  productionDate: z.string().optional(),
  tnvedCode: z.string().optional(),
  uitCode: z.string().optional(),
  uituCode: z.string().optional(),
});

export const SubmissionDocumentSchema = z.object({
  description: DocumentDescriptionSchema.optional(),
  docId: z.string().optional(),
  docStatus: z.string().optional(),
  docType: z.string().optional(),
  importRequest: z.boolean().default(false),
  ownerInn: z.string().optional(),
  participantInn: z.string().optional(),
  producerInn: z.string().optional(),
  productionDate: z.string().optional(),
  productionType: z.string().optional(),
  products: z.array(ProductSchema).optional(),
  regDate: z.string().optional(),
  regNumber: z.string().optional(),
});

export const DocumentSubmissionRequestSchema = z.object({
  document: SubmissionDocumentSchema,
  signature: z.string().min(1),
});

export const DocumentSubmissionResponseSchema = z.object({
  response: z.string(),
});

const wireString = z.string().nullable();

export const WireDescriptionSchema = z.object({
  participantInn: wireString,
});

export const WireProductSchema = z.object({
  certificate_document: wireString,
  certificate_document_date: wireString,
  certificate_document_number: wireString,
  owner_inn: wireString,
  producer_inn: wireString,
  production_date: wireString,
  tnved_code: wireString,
  uit_code: wireString,
  uitu_code: wireString,
});

export const WireDocumentSchema = z.object({
  description: WireDescriptionSchema.nullable(),
  doc_id: wireString,
  doc_status: wireString,
  doc_type: wireString,
  importRequest: z.boolean(),
  owner_inn: wireString,
  participant_inn: wireString,
  producer_inn: wireString,
  production_date: wireString,
  production_type: wireString,
  products: z.array(WireProductSchema).nullable(),
  reg_date: wireString,
  reg_number: wireString,
});

export type DocumentDescription = z.infer<typeof DocumentDescriptionSchema>;
export type Product = z.infer<typeof ProductSchema>;
export type SubmissionDocument = z.infer<typeof SubmissionDocumentSchema>;
export type SubmissionDocumentInput = z.input<typeof SubmissionDocumentSchema>;
export type DocumentSubmissionRequest = z.infer<typeof DocumentSubmissionRequestSchema>;
export type DocumentSubmissionResponse = z.infer<typeof DocumentSubmissionResponseSchema>;
export type WireProduct = z.infer<typeof WireProductSchema>;
export type WireDocument = z.infer<typeof WireDocumentSchema>;

function toWireProduct(product: Product): WireProduct {
  return {
    certificate_document: product.certificateDocument ?? null,
    certificate_document_date: product.certificateDocumentDate ?? null,
    certificate_document_number: product.certificateDocumentNumber ?? null,
    owner_inn: product.ownerInn ?? null,
    producer_inn: product.producerInn ?? null,
    production_date: product.productionDate ?? null,
    tnved_code: product.tnvedCode ?? null,
    uit_code: product.uitCode ?? null,
    uitu_code: product.uituCode ?? null,
  };
}

/**
 * Maps a validated document onto the endpoint's JSON shape. Key order is fixed and
 * absent fields are sent as `null`.
 */
export function toWireDocument(document: SubmissionDocument): WireDocument {
  return {
    description: document.description
      ? { participantInn: document.description.participantInn ?? null }
      : null,
    doc_id: document.docId ?? null,
    doc_status: document.docStatus ?? null,
    doc_type: document.docType ?? null,
    importRequest: document.importRequest,
    owner_inn: document.ownerInn ?? null,
    participant_inn: document.participantInn ?? null,
    producer_inn: document.producerInn ?? null,
    production_date: document.productionDate ?? null,
    production_type: document.productionType ?? null,
    products: document.products ? document.products.map(toWireProduct) : null,
    reg_date: document.regDate ?? null,
    reg_number: document.regNumber ?? null,
  };
}
