/**
 * Mappers between shipment records and the GLS Italy XML documents
 */

import type { ShipmentRecord, ShipmentSubmissionResult } from '@spedisci/core';
import type { GLSCredentials, GLSListedShipment, GLSParcel, GLSParcelResult } from '../types/index.js';
import { classifyRejection } from '../utils/errors.js';
import { safeValidateGLSParcelResult } from '../validation/index.js';
import { buildXml, findElements, leafFields, pick, type XmlNode } from './xml.js';

export function mapRecordToGLSParcel(record: ShipmentRecord, contractCode: string): GLSParcel {
  const parcel: GLSParcel = {
    CodiceContrattoGls: contractCode,
    RagioneSociale: record.recipientName,
    Indirizzo: record.address,
    Localita: record.locality,
    Zipcode: record.postalCode.padStart(5, '0'),
    Provincia: record.province.toUpperCase(),
    Bda: record.reference,
    Colli: String(record.packageCount),
    PesoReale: record.weightKg.toFixed(2),
    TipoPorto: record.portType,
    TipoCollo: record.packageType,
    TipoSpedizione: record.shipmentType,
    FormatoPdf: record.pdfFormat,
  };

  if (record.notes) parcel.Note = record.notes;
  if (record.phone) parcel.Cellulare = record.phone;
  if (record.email) parcel.Email = record.email;
  if (record.cashOnDelivery) {
    parcel.ModalitaIncasso = record.cashOnDelivery.type;
    parcel.ImportoContrassegno = record.cashOnDelivery.amount.toFixed(2);
  }

  return parcel;
}

/**
 * Credential elements shared by every request document
 */
function credentialElements(credentials: GLSCredentials, site: string) {
  return {
    SedeGls: site,
    CodiceClienteGls: credentials.customerCode,
    PasswordClienteGls: credentials.password,
  };
}

/**
 * XMLInfoParcel document of an AddParcel call
 */
export function buildAddParcelXml(credentials: GLSCredentials, parcels: GLSParcel[], generatePdf: boolean): string {
  return buildXml({
    Info: {
      ...credentialElements(credentials, credentials.site),
      ...(generatePdf && { GeneraPdf: '1' }),
      Parcel: parcels,
    },
  });
}

/**
 * _xmlRequest document of a CloseWorkDay call
 */
export function buildCloseWorkDayXml(credentials: GLSCredentials, site: string): string {
  return buildXml({ Info: credentialElements(credentials, site) });
}

/**
 * Form fields of a ListSped call
 */
export function buildListSpedForm(credentials: GLSCredentials): URLSearchParams {
  return new URLSearchParams(credentialElements(credentials, credentials.site));
}

function toParcelResult(fields: Record<string, string>): GLSParcelResult {
  const candidate = {
    bda: pick(fields, ['bda']),
    numeroSpedizione: pick(fields, ['numerospedizione', 'numspedizione', 'parcelid', 'sped']),
    esito: pick(fields, ['esito', 'result']),
    errore: pick(fields, ['errore', 'error', 'errormessage', 'notespedizione']),
    pdf: pick(fields, ['pdflabel', 'pdf', 'pdfbase64', 'label']),
  };
  const validated = safeValidateGLSParcelResult(candidate);
  return validated.success ? validated.data : {};
}

/**
 * Per-parcel results of an AddParcel answer
 *
 * Parcels are matched by Bda, falling back to their position in the request.
 * A parcel counts as created only with esito OK and a shipment number.
 * Requested references the answer does not mention are left out, and a
 * reference sent twice gets one result per parcel.
 */
export function mapAddParcelResponse(document: XmlNode, references: readonly string[]): ShipmentSubmissionResult[] {
  const results: ShipmentSubmissionResult[] = [];
  const requested = new Map<string, number>();
  for (const reference of references) requested.set(reference, (requested.get(reference) ?? 0) + 1);
  const answered = new Map<string, number>();

  findElements(document, 'parcel').forEach((element, index) => {
    const fields = leafFields(element);
    const parsed = toParcelResult(fields);
    const reference = parsed.bda ?? references[index];
    if (reference === undefined) return;
    // A reference is answered as many times as it was sent; echoes beyond that are dropped
    const count = answered.get(reference) ?? 0;
    if (count >= (requested.get(reference) ?? 1)) return;
    answered.set(reference, count + 1);

    const esito = parsed.esito?.toUpperCase();
    if (esito === 'OK' && parsed.numeroSpedizione) {
      results.push({
        reference,
        status: 'created',
        shipmentNumber: parsed.numeroSpedizione,
        ...(parsed.pdf !== undefined && { label: parsed.pdf }),
        raw: fields,
      });
      return;
    }

    const errorMessage = parsed.errore ?? (esito ? `Esito ${esito}` : 'Risposta non parsabile');
    results.push({
      reference,
      status: 'failed',
      errorMessage,
      errorCode: classifyRejection(errorMessage),
      raw: fields,
    });
  });

  return results;
}

/**
 * Entries of a ListSped answer
 */
export function mapListSpedResponse(document: XmlNode): GLSListedShipment[] {
  return findElements(document, 'spedizione').map((element) => {
    const fields = leafFields(element);
    return {
      bda: pick(fields, ['bda']),
      numeroSpedizione: pick(fields, ['numerospedizione', 'numspedizione', 'sped']),
      stato: pick(fields, ['statospedizione', 'stato', 'descrizionestato']),
      fields,
    };
  });
}
