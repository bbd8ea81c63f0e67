import type { CameraSpecs, NormalizedSpec, RawCategory } from "./types";

type FieldLookup = (key: string) => string | null;

/** Keys naming the camera setup, richest label last; the first present wins */
export const CAMERA_MODULE_KEYS = ["single", "dual", "triple", "quad", "penta"] as const;

/** Category titles with a section in NormalizedSpec */
export const KNOWN_CATEGORIES = [
  "network",
  "launch",
  "body",
  "display",
  "platform",
  "memory",
  "main camera",
  "selfie camera",
  "sound",
  "comms",
  "features",
  "battery",
  "misc",
] as const;

/** Case-insensitive key -> value view of one category; the last duplicate key wins */
function fieldLookup(category: RawCategory): FieldLookup {
  const values = new Map<string, string>();
  for (const { key, value } of category.pairs) {
    values.set(key.trim().toLowerCase(), value);
  }
  return (key) => {
    const value = values.get(key.toLowerCase());
    return value === undefined || value.trim() === "" ? null : value;
  };
}

function camera(get: FieldLookup): CameraSpecs {
  let modules: string | null = null;
  for (const key of CAMERA_MODULE_KEYS) {
    modules = get(key);
    if (modules !== null) break;
  }
  return { modules, features: get("features"), video: get("video") };
}

/**
 * Map raw categories onto the fixed section schema. Never throws: an absent
 * category gives a null section, an absent key a null field. Categories
 * outside KNOWN_CATEGORIES are ignored here.
 */
export function normalize(categories: RawCategory[]): NormalizedSpec {
  const byTitle = new Map<string, RawCategory>();
  for (const category of categories) {
    const title = category.title.trim().toLowerCase();
    if (!byTitle.has(title)) byTitle.set(title, category);
  }

  function section<T>(title: (typeof KNOWN_CATEGORIES)[number], build: (get: FieldLookup) => T): T | null {
    const category = byTitle.get(title);
    return category ? build(fieldLookup(category)) : null;
  }

  return {
    network: section("network", (get) => ({
      technology: get("technology"),
      bands2g: get("2g bands"),
      bands3g: get("3g bands"),
      bands4g: get("4g bands"),
      bands5g: get("5g bands"),
      speed: get("speed"),
    })),
    launch: section("launch", (get) => ({
      announced: get("announced"),
      status: get("status"),
    })),
    body: section("body", (get) => ({
      dimensions: get("dimensions"),
      weight: get("weight"),
      build: get("build"),
      sim: get("sim"),
    })),
    display: section("display", (get) => ({
      displayType: get("type"),
      size: get("size"),
      resolution: get("resolution"),
      protection: get("protection"),
    })),
    platform: section("platform", (get) => ({
      os: get("os"),
      chipset: get("chipset"),
      cpu: get("cpu"),
      gpu: get("gpu"),
    })),
    memory: section("memory", (get) => ({
      cardSlot: get("card slot"),
      internal: get("internal"),
    })),
    mainCamera: section("main camera", camera),
    selfieCamera: section("selfie camera", camera),
    sound: section("sound", (get) => ({
      loudspeaker: get("loudspeaker"),
      jack35mm: get("3.5mm jack"),
    })),
    comms: section("comms", (get) => ({
      wlan: get("wlan"),
      bluetooth: get("bluetooth"),
      positioning: get("positioning"),
      nfc: get("nfc"),
      radio: get("radio"),
      usb: get("usb"),
    })),
    features: section("features", (get) => ({
      sensors: get("sensors"),
    })),
    battery: section("battery", (get) => ({
      batteryType: get("type"),
      charging: get("charging"),
    })),
    misc: section("misc", (get) => ({
      colors: get("colors"),
      models: get("models"),
      sar: get("sar"),
      sarEu: get("sar eu"),
      price: get("price"),
    })),
  };
}
