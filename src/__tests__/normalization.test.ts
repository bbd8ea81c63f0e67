import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { parseSpecificationPage } from "../lib/catalog/specs";
import { normalize } from "../lib/normalization";
import type { RawCategory } from "../lib/types";

describe("normalize", () => {
  it("maps the display category onto its fields", () => {
    const spec = normalize([
      {
        title: "Display",
        pairs: [
          { key: "Type", value: "IPS LCD" },
          { key: "Size", value: "6.1 inches" },
          { key: "Resolution", value: "1170x2532" },
        ],
      },
    ]);

    expect(spec.display).toEqual({
      displayType: "IPS LCD",
      size: "6.1 inches",
      resolution: "1170x2532",
      protection: null,
    });
  });

  it("leaves absent categories null rather than empty", () => {
    const spec = normalize([{ title: "Launch", pairs: [{ key: "Status", value: "Available" }] }]);

    expect(spec.battery).toBeNull();
    expect(spec.display).toBeNull();
    expect(spec.launch).toEqual({ announced: null, status: "Available" });
  });

  it("matches titles and keys case-insensitively", () => {
    const spec = normalize([{ title: "BATTERY", pairs: [{ key: "type", value: "Li-Ion 5000 mAh" }, { key: "CHARGING", value: "45W" }] }]);

    expect(spec.battery).toEqual({ batteryType: "Li-Ion 5000 mAh", charging: "45W" });
  });

  it("lets the last duplicate key win", () => {
    const spec = normalize([
      {
        title: "Platform",
        pairs: [
          { key: "Chipset", value: "First" },
          { key: "Chipset", value: "Second" },
        ],
      },
    ]);

    expect(spec.platform?.chipset).toBe("Second");
  });

  it("picks camera modules by single/dual/triple/quad/penta priority", () => {
    const categories: RawCategory[] = [
      {
        title: "Main Camera",
        pairs: [
          { key: "Quad", value: "quad value" },
          { key: "Dual", value: "dual value" },
          { key: "Video", value: "8K" },
        ],
      },
      { title: "Selfie camera", pairs: [{ key: "Single", value: "12 MP" }] },
    ];

    const spec = normalize(categories);

    expect(spec.mainCamera).toEqual({ modules: "dual value", features: null, video: "8K" });
    expect(spec.selfieCamera).toEqual({ modules: "12 MP", features: null, video: null });
  });

  it("maps sound, comms, misc and network keys", () => {
    const spec = normalize([
      { title: "Sound", pairs: [{ key: "3.5mm jack", value: "No" }] },
      { title: "Comms", pairs: [{ key: "NFC", value: "Yes" }, { key: "USB", value: "USB Type-C 3.2" }] },
      { title: "Misc", pairs: [{ key: "SAR EU", value: "0.98 W/kg (head)" }, { key: "Price", value: "$ 799.99" }] },
      { title: "Network", pairs: [{ key: "4G bands", value: "1, 3, 7" }] },
    ]);

    expect(spec.sound).toEqual({ loudspeaker: null, jack35mm: "No" });
    expect(spec.comms).toMatchObject({ nfc: "Yes", usb: "USB Type-C 3.2", wlan: null });
    expect(spec.misc).toMatchObject({ sarEu: "0.98 W/kg (head)", sar: null, price: "$ 799.99" });
    expect(spec.network).toMatchObject({ bands4g: "1, 3, 7", bands2g: null });
  });

  it("treats empty values as missing", () => {
    expect(normalize([{ title: "Features", pairs: [{ key: "Sensors", value: "  " }] }]).features).toEqual({
      sensors: null,
    });
  });

  it("ignores unknown categories", () => {
    const spec = normalize([{ title: "Tests", pairs: [{ key: "Loudspeaker", value: "-25 LUFS" }] }]);

    expect(spec.sound).toBeNull();
  });

  it("normalizes a parsed detail page", () => {
    const html = readFileSync(resolve(__dirname, "fixtures/spec-detail.html"), "utf-8");
    const spec = normalize(parseSpecificationPage(html).categories);

    expect(spec.network?.bands2g).toBe("GSM 850 / 900 / 1800 / 1900\nCDMA 800");
    expect(spec.network?.bands5g).toBe("1, 3, 78 SA/NSA");
    expect(spec.memory).toEqual({ cardSlot: "No", internal: "128GB 6GB RAM\n256GB 8GB RAM" });
    expect(spec.mainCamera?.modules).toBe("50 MP, f/1.8, (wide)\n12 MP, f/2.2, (ultrawide)");
    expect(spec.platform).toBeNull();
    expect(spec.sound).toBeNull();
  });
});
