// frbr_uri.ts
// FRBR URIs: the work / expression / manifestation identifiers of a document.
//
//   /akn/za/act/2009/1                      work
//   /akn/za/act/2009/1/!schedule1           work component
//   /akn/za/act/2009/1/eng@2012-01-01/!main expression (component)
//   /akn/za/act/2009/1/eng@2012-01-01.xml   manifestation

import { ValidationError } from "../shared/errors.ts";

export interface FrbrUriCoords {
  prefix?: string;
  country: string;
  locality?: string;
  doctype: string;
  subtype?: string;
  actor?: string;
  date: string;
  number: string;
  workComponent?: string;
  language?: string;
  expressionDate?: string;
  expressionSubcomponent?: string;
  format?: string;
}

const FRBR_URI_RE = new RegExp(
  "^(?:/(akn))?" + //                                    prefix
    "/([a-z]{2})(?:-([^/]+))?" + //                      country, locality
    "/([^/]+)" + //                                      doctype
    "(?:/([^/]+))?" + //                                 subtype
    "(?:/([^/]+))?" + //                                 actor
    "/(\\d{4}(?:-\\d{2}(?:-\\d{2})?)?)" + //            date
    "/([^/]+)" + //                                      number
    "(?:" +
    "/!([^/]+)" + //                                     work component
    "|" +
    "/([a-z]{3})([@:][^/.]*)?" + //                      language, expression date
    "(?:/!([^/.]+))?" + //                               expression component
    "(?:/([^/.]+))?" + //                                expression subcomponent
    "(?:\\.([a-z0-9]+))?" + //                          format
    ")?$",
);

export class FrbrUri {
  prefix: string;
  country: string;
  locality?: string;
  doctype: string;
  subtype?: string;
  actor?: string;
  date: string;
  number: string;
  workComponent?: string;
  language: string;
  /** Empty, or `@`/`:` followed by a date, exactly as it appears in the URI */
  expressionDate: string;
  expressionSubcomponent?: string;
  format?: string;

  constructor(coords: FrbrUriCoords) {
    this.prefix = coords.prefix ?? "akn";
    this.country = coords.country;
    this.locality = coords.locality || undefined;
    this.doctype = coords.doctype;
    this.subtype = coords.subtype || undefined;
    this.actor = coords.actor || undefined;
    this.date = coords.date;
    this.number = coords.number;
    this.workComponent = coords.workComponent || undefined;
    this.language = coords.language ?? "eng";
    this.expressionDate = coords.expressionDate ?? "";
    this.expressionSubcomponent = coords.expressionSubcomponent || undefined;
    this.format = coords.format || undefined;
  }

  static parse(text: string): FrbrUri {
    const m = FRBR_URI_RE.exec(text.trim());
    if (!m) throw new ValidationError(`Invalid FRBR URI: ${text}`, { actual: text });

    const [, prefix, country, locality, doctype, subtype, actor, date, number] = m;
    const [workComponent, language, expressionDate, expressionComponent, expressionSubcomponent, format] = m.slice(9);

    return new FrbrUri({
      prefix: prefix ?? "",
      country: country ?? "",
      locality,
      doctype: doctype ?? "",
      subtype,
      actor,
      date: date ?? "",
      number: number ?? "",
      workComponent: workComponent ?? expressionComponent,
      language,
      expressionDate,
      expressionSubcomponent,
      format,
    });
  }

  /** A value with every coordinate blank. */
  static empty(): FrbrUri {
    return new FrbrUri({ prefix: "", country: "", doctype: "", date: "", number: "", language: "" });
  }

  /** Country and locality, eg. `za-cpt`. */
  get place(): string {
    return this.locality ? `${this.country}-${this.locality}` : this.country;
  }

  /** The work URI without any component. */
  uri(): string {
    const parts = [this.prefix, this.place, this.doctype, this.subtype, this.actor, this.date, this.number];
    return "/" + parts.filter((p): p is string => !!p).join("/");
  }

  workUri(workComponent = true): string {
    return this.withComponent(this.uri(), workComponent);
  }

  expressionUri(workComponent = true): string {
    return this.withComponent(`${this.uri()}/${this.language}${this.expressionDate}`, workComponent);
  }

  manifestationUri(workComponent = true): string {
    const uri = this.expressionUri(workComponent);
    return this.format ? `${uri}.${this.format}` : uri;
  }

  clone(): FrbrUri {
    return new FrbrUri({ ...this });
  }

  toString(): string {
    return this.uri();
  }

  private withComponent(uri: string, include: boolean): string {
    return include && this.workComponent ? `${uri}/!${this.workComponent}` : uri;
  }
}
