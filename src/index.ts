export {
    login,
    getModel,
    postModel,
    patchModel,
    putModel,
    deleteModel,
    readTsData,
    postTsData,
    getTsEndDate,
    modelUrl,
} from './services/apiClient';
export {
    ApiClientError,
    AuthenticationError,
    NotFoundError,
    ValidationError,
    RequestError,
    TimeseriesFormatError,
} from './services/errors';
export { createHttp, formatAxiosError } from './services/http';
export { loadConfig, type ClientConfig } from './lib/config';
export { urljoin } from './lib/urljoin';
export { MIN_TIMESTAMP, minDate, formatTimestamp, formatIsoTimestamp, parseTimestamp } from './lib/dateUtils';
export { parseTsData, serializeTsData, normalizeRecords } from './lib/tsdata';
export { ANONYMOUS, MODEL_TYPES } from './types';
export type {
    ClientOptions,
    Credentials,
    DateRange,
    JsonObject,
    JsonValue,
    ModelFields,
    ModelType,
    TimeseriesRecord,
} from './types';
