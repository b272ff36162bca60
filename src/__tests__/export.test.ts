import { describe, test, expect } from "vitest";
import {
  BAT_OCCURRENCE_COLUMNS,
  batOccurrenceTable,
  buildExport,
  formatBool,
  formatFloat,
  formatIsoDate,
  herpOccurrenceTable,
  herpSummaryColumns,
  toCsv,
} from "../export.js";
import { createRecordStore } from "../records.js";
import type { BatRecord, HerpRecord } from "../records.js";
import { day, makeBat, makeHerp } from "./test-utils.js";

const origin = { lat: -40.3, lng: 175.75 };

function storeOf(bats: BatRecord[], herps: HerpRecord[] = []) {
  return createRecordStore({ bats, herps, threatStatus: [] });
}

describe("field formatting", () => {
  test("whole numbers keep one decimal place", () => {
    expect(formatFloat(175)).toBe("175.0");
    expect(formatFloat(-40)).toBe("-40.0");
    expect(formatFloat(0)).toBe("0.0");
    expect(formatFloat(175.754)).toBe("175.754");
  });

  test("booleans and dates", () => {
    expect(formatBool(true)).toBe("True");
    expect(formatBool(false)).toBe("False");
    expect(formatIsoDate(day("2019-09-09"))).toBe("2019-09-09");
  });
});

describe("toCsv", () => {
  test("quotes fields that contain commas", () => {
    expect(toCsv({ header: ["a", "b"], rows: [["1", "x, y"]] })).toBe('a,b\n1,"x, y"\n');
  });

  test("header only when there are no rows", () => {
    expect(toCsv({ header: ["a", "b"], rows: [] })).toBe("a,b\n");
  });

  test("ends with a single newline after the last row", () => {
    expect(toCsv({ header: ["a"], rows: [["1"], ["2"]] })).toBe("a\n1\n2\n");
  });

  test("occurrence export with nothing in radius has no blank row", () => {
    const store = storeOf([makeBat({ location: { lat: 0, lng: 1 } })]);
    const file = buildExport(store, { origin: { lat: 0, lng: 0 }, radiusKm: 5 }, "bat_occurrences");
    expect(file?.csv).toBe(`${BAT_OCCURRENCE_COLUMNS.join(",")}\n`);
  });
});

describe("batOccurrenceTable", () => {
  test("one row per recorded event with location and bearing columns", () => {
    const store = storeOf([
      makeBat({
        location: origin,
        observedOn: day("2021-01-15"),
        isRoost: true,
        locationName: "Ridge track",
        numberOfPasses: "12",
        detectorType: "AR4",
        nightsOut: "3",
        surveyMethod: "Acoustic",
      }),
    ]);
    const table = batOccurrenceTable(store, { origin, radiusKm: 5 });
    expect(table.header).toEqual(BAT_OCCURRENCE_COLUMNS);
    expect(toCsv(table).split("\n")[1]).toBe(
      'Chalinolobus tuberculatus,Ridge track,True,2021-01-15,12,AR4,3,Acoustic,175.75,-40.3,"-40.3, 175.75",0.0,north',
    );
  });

  test("orders by species label, then distance, without splitting dual detections", () => {
    const at = (lng: number) => ({ lat: 0, lng });
    const store = storeOf([
      makeBat({ species: "Mystacina tuberculata", location: at(0.01), locationName: "a" }),
      makeBat({ species: "Chalinolobus tuberculatus", location: at(0.02), locationName: "b" }),
      makeBat({ species: "No bat species detected", location: at(0.001), locationName: "c" }),
      makeBat({ species: "Both species detected", location: at(0.03), locationName: "d" }),
      makeBat({ species: "Chalinolobus tuberculatus", location: at(0.005), locationName: "e" }),
      makeBat({ species: "Unknown bat species", location: at(0.04), locationName: "f" }),
      makeBat({ species: "Chalinolobus tuberculatus", location: at(1), locationName: "far" }),
    ]);
    const table = batOccurrenceTable(store, { origin: { lat: 0, lng: 0 }, radiusKm: 10 });
    expect(table.rows.map((row) => row[1])).toEqual(["d", "e", "b", "a", "f", "c"]);
  });
});

describe("herpOccurrenceTable", () => {
  test("orders by name then distance", () => {
    const store = storeOf(
      [],
      [
        makeHerp({ scientificName: "Oligosoma polychroma", location: { lat: 0, lng: 0.02 }, placeName: "p1" }),
        makeHerp({ scientificName: "Naultinus grayii", location: { lat: 0, lng: 0.03 }, placeName: "p2" }),
        makeHerp({ scientificName: "Naultinus grayii", location: { lat: 0, lng: 0.01 }, placeName: "p3" }),
      ],
    );
    const table = herpOccurrenceTable(store, { origin: { lat: 0, lng: 0 }, radiusKm: 10 });
    expect(table.rows.map((row) => row[4])).toEqual(["p3", "p2", "p1"]);
  });

  test("row fields", () => {
    const store = storeOf(
      [],
      [
        makeHerp({
          location: { lat: -40, lng: 175 },
          observedOn: day("2018-12-01"),
          isVerified: false,
          placeName: "Gorge",
          observationType: "Undefined",
          individualCount: "2",
          identificationMethod: "Photo",
          ageInYears: "",
        }),
      ],
    );
    const table = herpOccurrenceTable(store, { origin: { lat: -40, lng: 175 }, radiusKm: 1 });
    expect(table.rows).toEqual([
      [
        "Naultinus grayii",
        "Northland green gecko",
        "False",
        "2018-12-01",
        "Gorge",
        "Undefined",
        "2",
        "Photo",
        "",
        "175.0",
        "-40.0",
        "-40.0, 175.0",
        "0.0",
        "north",
      ],
    ]);
  });
});

describe("buildExport", () => {
  const store = storeOf([makeBat({ location: origin })], [makeHerp({ location: { lat: 0, lng: 0 } })]);
  const query = { origin, radiusKm: 7 };

  test("file names carry the radius", () => {
    expect(buildExport(store, query, "bat_occurrences")?.filename).toBe("bat_data_occurrences_within_7km.csv");
    expect(buildExport(store, query, "bat_summary")?.filename).toBe("bat_summary_data_within_7km.csv");
    expect(buildExport(store, query, "herp_occurrences")?.filename).toBe(
      "herpetofauna_data_occurrences_within_7km.csv",
    );
  });

  test("herp summary is unavailable when no species are in radius", () => {
    expect(buildExport(store, query, "herp_summary")).toBeNull();
  });

  test("herp summary header names the radius", () => {
    const file = buildExport(store, { origin: { lat: 0, lng: 0 }, radiusKm: 7 }, "herp_summary");
    expect(file?.filename).toBe("herpetofauna_summary_data_within_7km.csv");
    expect(file?.csv.split("\n")[0]).toBe(herpSummaryColumns(7).join(","));
    expect(file?.csv.split("\n")[1]).toBe(
      "unknown,Naultinus grayii,Northland green gecko,unknown,Incidental (1),1,01/06/2020,0.0 km north,0.0 km north,0.0 km north",
    );
  });

  test("bat summary lists both species", () => {
    const csv = buildExport(store, query, "bat_summary")?.csv ?? "";
    expect(csv.split("\n")).toEqual([
      "Species,All time nearest record,Nearest record 2013 to 2023,Nearest record 2018 to 2023,All time nearest roost,Nearest roost 2013 to 2023,Nearest roost 2018 to 2023",
      "Chalinolobus tuberculatus,0.0 km north,0.0 km north,0.0 km north,No roosts found,No roosts found for 2013-2023,No roosts found for 2018-2023",
      "Mystacina tuberculata,No records found,No records found for 2013-2023,No records found for 2018-2023,No roosts found,No roosts found for 2013-2023,No roosts found for 2018-2023",
      "",
    ]);
  });
});
