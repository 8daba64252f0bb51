import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';

import { RequestBuilder } from '../builder.js';
import { defaultConfig } from '../config.js';
import type { ClientConfig } from '../config.js';
import { DecodeError, InvalidArgumentError } from '../errors.js';
import { ApiResult } from '../result.js';
import type { SaveFormat } from '../result.js';
import { buildEndpoint, decodeJson, validate } from '../transport.js';
import type { HttpRequest } from '../transport.js';

export const COORD_SYSTEMS = ['WGS84', 'WCONGNAMUL', 'CONGNAMUL', 'WTM', 'TM'] as const;

export type CoordSystem = (typeof COORD_SYSTEMS)[number];

export type ResponseFormat = 'json' | 'xml';

export function isCoordSystem(value: string): value is CoordSystem {
  return COORD_SYSTEMS.some((system) => system === value);
}

const regionFields = (coordinate: z.ZodNumber) =>
  z.object({
    region_type: z.string(),
    address_name: z.string(),
    region_1depth_name: z.string(),
    region_2depth_name: z.string(),
    region_3depth_name: z.string(),
    region_4depth_name: z.string(),
    code: z.string(),
    x: coordinate,
    y: coordinate,
  });

const jsonSchema = z.object({
  meta: z.object({ total_count: z.number().int() }),
  documents: z.array(regionFields(z.number())),
});

// Element text arrives as strings and a result without regions has no documents element.
const xmlSchema = z.object({
  result: z.object({
    meta: z.object({ total_count: z.coerce.number().int() }),
    documents: z.array(regionFields(z.coerce.number())).default([]),
  }),
});

export type RegionWire = z.infer<ReturnType<typeof regionFields>>;

export type CoordToDistrictWire = z.infer<typeof jsonSchema>;

export interface Region {
  regionType: string;
  addressName: string;
  region1depthName: string;
  region2depthName: string;
  region3depthName: string;
  region4depthName: string;
  code: string;
  x: number;
  y: number;
}

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_name, jpath) => jpath === 'result.documents',
});

const xmlBuilder = new XMLBuilder({ format: true, indentBy: '  ' });

export function parseCoordToDistrictXml(text: string): CoordToDistrictWire {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new DecodeError(`response is not valid XML: ${valid.err.msg} (line ${valid.err.line})`);
  }
  return validate(xmlParser.parse(text), xmlSchema).result;
}

export class CoordToDistrictResult extends ApiResult<CoordToDistrictWire> {
  constructor(
    readonly meta: { readonly totalCount: number },
    readonly documents: readonly Region[],
  ) {
    super();
  }

  static fromWire(wire: CoordToDistrictWire): CoordToDistrictResult {
    return new CoordToDistrictResult(
      { totalCount: wire.meta.total_count },
      wire.documents.map((doc) => ({
        regionType: doc.region_type,
        addressName: doc.address_name,
        region1depthName: doc.region_1depth_name,
        region2depthName: doc.region_2depth_name,
        region3depthName: doc.region_3depth_name,
        region4depthName: doc.region_4depth_name,
        code: doc.code,
        x: doc.x,
        y: doc.y,
      })),
    );
  }

  toJSON(): CoordToDistrictWire {
    return {
      meta: { total_count: this.meta.totalCount },
      documents: this.documents.map(
        (region): RegionWire => ({
          region_type: region.regionType,
          address_name: region.addressName,
          region_1depth_name: region.region1depthName,
          region_2depth_name: region.region2depthName,
          region_3depth_name: region.region3depthName,
          region_4depth_name: region.region4depthName,
          code: region.code,
          x: region.x,
          y: region.y,
        }),
      ),
    };
  }

  toXML(): string {
    return xmlBuilder.build({ result: this.toJSON() });
  }

  protected override serializers(): Partial<Record<SaveFormat, () => string>> {
    return { ...super.serializers(), xml: () => this.toXML() };
  }
}

/**
 * Looks up the administrative and legal districts containing a coordinate.
 *
 * Defaults to a JSON response with WGS84 in and out.
 */
export class CoordToDistrictBuilder extends RequestBuilder<CoordToDistrictResult> {
  private responseFormat: ResponseFormat = 'json';
  private inputSystem: CoordSystem = 'WGS84';
  private outputSystem: CoordSystem = 'WGS84';

  constructor(
    readonly x: number,
    readonly y: number,
    config: ClientConfig = defaultConfig,
  ) {
    super(config);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new InvalidArgumentError(`coordinates must be finite numbers, got (${x}, ${y})`);
    }
  }

  get format(): ResponseFormat {
    return this.responseFormat;
  }

  get inputCoord(): CoordSystem {
    return this.inputSystem;
  }

  get outputCoord(): CoordSystem {
    return this.outputSystem;
  }

  formatAs(format: string): this {
    if (format !== 'json' && format !== 'xml') {
      throw new InvalidArgumentError(`format must be json or xml, got ${format}`);
    }
    this.responseFormat = format;
    return this;
  }

  input(coord: string): this {
    this.inputSystem = requireCoordSystem('input', coord);
    return this;
  }

  output(coord: string): this {
    this.outputSystem = requireCoordSystem('output', coord);
    return this;
  }

  protected prepare(): HttpRequest {
    return {
      method: 'GET',
      url: buildEndpoint(this.config.endpoints.local, `geo/coord2regioncode.${this.responseFormat}`, {
        x: formatCoordinate(this.x),
        y: formatCoordinate(this.y),
        input_coord: this.inputSystem,
        output_coord: this.outputSystem,
      }),
      headers: {},
    };
  }

  protected decode(body: string): CoordToDistrictResult {
    const wire = this.responseFormat === 'xml' ? parseCoordToDistrictXml(body) : decodeJson(body, jsonSchema);
    return CoordToDistrictResult.fromWire(wire);
  }
}

/** Plain decimal form of `value`, never exponent notation. */
export function formatCoordinate(value: number): string {
  const shortest = String(value);
  const [mantissa, exponent] = shortest.split('e');
  if (exponent === undefined) {
    return shortest;
  }

  const negative = mantissa.startsWith('-');
  const [whole, fraction = ''] = (negative ? mantissa.slice(1) : mantissa).split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  let plain: string;
  if (point <= 0) {
    plain = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    plain = digits + '0'.repeat(point - digits.length);
  } else {
    plain = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${plain}` : plain;
}

function requireCoordSystem(direction: 'input' | 'output', coord: string): CoordSystem {
  if (!isCoordSystem(coord)) {
    throw new InvalidArgumentError(
      `${direction} coordinate system must be one of ${COORD_SYSTEMS.join(', ')}, got ${coord}`,
    );
  }
  return coord;
}

export function coordToDistrict(x: number, y: number, config: ClientConfig = defaultConfig): CoordToDistrictBuilder {
  return new CoordToDistrictBuilder(x, y, config);
}
