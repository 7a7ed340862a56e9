export { version } from "./version";

// parsing framework
export { decodeLatin1, EdneParser, FIELD_SEPARATOR, parseU32 } from "./parser/base";
export {
    EmptyFieldError,
    EncodingError,
    FieldCountError,
    InvalidNumberError,
    InvalidValueError,
    ParseError,
    type ParseErrorKind,
    ParseFailedError,
} from "./parser/errors";
export { FieldReader, parseRecordLine, type RecordKind } from "./parser/record-kind";
export { EdneCollection } from "./parser/collection";

// record kinds
export { ADDRESS_KIND, Addresses } from "./parser/addresses";
export { BIG_USER_KIND, BigUsers } from "./parser/big-users";
export { CPC_KIND, Cpcs } from "./parser/cpcs";
export { LOCALITY_KIND, Localities } from "./parser/localities";
export { NEIGHBORHOOD_KIND, Neighborhoods } from "./parser/neighborhoods";
export {
    OPERATIONAL_UNIT_KIND,
    OperationalUnits,
} from "./parser/operational-units";

// models
export {
    AddressId,
    BigUserId,
    CpcId,
    type Identifier,
    IdentifierError,
    type IdentifierFactory,
    LocalityId,
    NeighborhoodId,
    OperationalUnitId,
    StreetId,
} from "./models/identifiers";
export {
    compareUf,
    isUf,
    parseUf,
    type Uf,
    UF_NAMES,
    UfParseError,
    UFS,
    ufFullName,
} from "./models/uf";
export { InvalidCodeError } from "./models/codes";
export {
    type Locality,
    LocalitySituation,
    LocalityType,
    parseLocalitySituation,
    parseLocalityType,
} from "./models/locality";
export type { Neighborhood } from "./models/neighborhood";
export {
    type Address,
    displayStreet,
    parseStreetTypeIndicator,
    StreetTypeIndicator,
} from "./models/address";
export type { BigUser } from "./models/big-user";
export {
    type OperationalUnit,
    parsePostBoxIndicator,
    PostBoxIndicator,
} from "./models/operational-unit";
export type { Cpc } from "./models/cpc";

// CEP index
export { CEP_KIND_LABELS, type CepInfo, type CepKind } from "./lookup/cep-info";
export { CepLookup } from "./lookup/cep-lookup";
export {
    CepLookupBuilder,
    type EdneSnapshot,
    mergeSnapshot,
} from "./lookup/builder";
