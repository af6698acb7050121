export {
  mapRecordToGLSParcel,
  buildAddParcelXml,
  buildCloseWorkDayXml,
  buildListSpedForm,
  mapAddParcelResponse,
  mapListSpedResponse,
} from './parcels.js';
export { parseServiceXml, findElements, findText, textContent } from './xml.js';
export type { XmlNode, XmlElement } from './xml.js';
