import ApiExtension, { ExtensionName, ExtensionOptions } from './extension';
import { bodyParameters, queryParameters } from '../models/parameter-set';
import { bboxCrsField, crsField } from '../models/search';

export const CRS_CONFORMANCE_CLASSES = [
  'http://www.opengis.net/spec/ogcapi-features-2/1.0/conf/crs',
];

export const crsGetParameters = queryParameters('CrsExtensionGetRequest', [crsField, bboxCrsField]);

export const crsPostParameters = bodyParameters('CrsExtensionPostRequest', [crsField, bboxCrsField]);

/**
 * Lets clients choose the coordinate reference system of returned geometries and of the
 * `bbox` parameter
 */
export default class CrsExtension extends ApiExtension {
  readonly name = ExtensionName.CRS;

  /**
   * @param options - overrides of the defaults
   */
  constructor(options: ExtensionOptions = {}) {
    super(CRS_CONFORMANCE_CLASSES, { GET: crsGetParameters, POST: crsPostParameters }, options);
  }
}
