export type BiddingZone = {
  readonly code: string;
  readonly eic: string; // EIC Y-code used as in_Domain/out_Domain
  readonly name: string;
  readonly timeZone: string;
};

export const BIDDING_ZONES: Readonly<Record<string, BiddingZone>> = {
  FI: { code: "FI", eic: "10YFI-1--------U", name: "Finland", timeZone: "Europe/Helsinki" },
  EE: { code: "EE", eic: "10Y1001A1001A39I", name: "Estonia", timeZone: "Europe/Tallinn" },
  LV: { code: "LV", eic: "10YLV-1001A00074", name: "Latvia", timeZone: "Europe/Riga" },
  LT: { code: "LT", eic: "10YLT-1001A0008Q", name: "Lithuania", timeZone: "Europe/Vilnius" },
  SE1: { code: "SE1", eic: "10Y1001A1001A44P", name: "Luleå", timeZone: "Europe/Stockholm" },
  SE2: { code: "SE2", eic: "10Y1001A1001A45N", name: "Sundsvall", timeZone: "Europe/Stockholm" },
  SE3: { code: "SE3", eic: "10Y1001A1001A46L", name: "Stockholm", timeZone: "Europe/Stockholm" },
  SE4: { code: "SE4", eic: "10Y1001A1001A47J", name: "Malmö", timeZone: "Europe/Stockholm" },
  NO1: { code: "NO1", eic: "10YNO-1--------2", name: "Oslo", timeZone: "Europe/Oslo" },
  NO2: { code: "NO2", eic: "10YNO-2--------T", name: "Kristiansand", timeZone: "Europe/Oslo" },
  NO3: { code: "NO3", eic: "10YNO-3--------J", name: "Trondheim", timeZone: "Europe/Oslo" },
  NO4: { code: "NO4", eic: "10YNO-4--------9", name: "Tromsø", timeZone: "Europe/Oslo" },
  NO5: { code: "NO5", eic: "10Y1001A1001A48H", name: "Bergen", timeZone: "Europe/Oslo" },
  DK1: { code: "DK1", eic: "10YDK-1--------W", name: "West Denmark", timeZone: "Europe/Copenhagen" },
  DK2: { code: "DK2", eic: "10YDK-2--------M", name: "East Denmark", timeZone: "Europe/Copenhagen" },
  DE_LU: { code: "DE_LU", eic: "10Y1001A1001A82H", name: "Germany-Luxembourg", timeZone: "Europe/Berlin" },
  NL: { code: "NL", eic: "10YNL----------L", name: "Netherlands", timeZone: "Europe/Amsterdam" },
  BE: { code: "BE", eic: "10YBE----------2", name: "Belgium", timeZone: "Europe/Brussels" },
  FR: { code: "FR", eic: "10YFR-RTE------C", name: "France", timeZone: "Europe/Paris" },
  AT: { code: "AT", eic: "10YAT-APG------L", name: "Austria", timeZone: "Europe/Vienna" },
  PL: { code: "PL", eic: "10YPL-AREA-----S", name: "Poland", timeZone: "Europe/Warsaw" },
};
