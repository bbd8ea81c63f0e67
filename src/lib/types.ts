// ===== Enums =====

export enum ChannelKind {
  DIRECT = "direct",
  PROXY = "proxy",
  RENDER_PROXY = "render",
}

// ===== Catalog =====

export interface Brand {
  name: string;
  slug: string; // e.g. "apple-phones-48"
  deviceCount: number; // best effort, 0 when the index text has no count
}

export interface ListingItem {
  name: string;
  detailId: string; // e.g. "apple_iphone_15-12559"
  detailUrl: string;
  thumbnailUrl: string | null;
}

export interface SpecPair {
  key: string;
  value: string;
}

/** One titled table of the detail page, in page order */
export interface RawCategory {
  title: string;
  pairs: SpecPair[];
}

export interface SpecSheet {
  name: string | null;
  categories: RawCategory[];
}

// ===== Normalized sections =====

export interface NetworkSpecs {
  technology: string | null;
  bands2g: string | null;
  bands3g: string | null;
  bands4g: string | null;
  bands5g: string | null;
  speed: string | null;
}

export interface LaunchSpecs {
  announced: string | null;
  status: string | null;
}

export interface BodySpecs {
  dimensions: string | null;
  weight: string | null;
  build: string | null;
  sim: string | null;
}

export interface DisplaySpecs {
  displayType: string | null;
  size: string | null;
  resolution: string | null;
  protection: string | null;
}

export interface PlatformSpecs {
  os: string | null;
  chipset: string | null;
  cpu: string | null;
  gpu: string | null;
}

export interface MemorySpecs {
  cardSlot: string | null;
  internal: string | null;
}

export interface CameraSpecs {
  modules: string | null;
  features: string | null;
  video: string | null;
}

export interface SoundSpecs {
  loudspeaker: string | null;
  jack35mm: string | null;
}

export interface CommsSpecs {
  wlan: string | null;
  bluetooth: string | null;
  positioning: string | null;
  nfc: string | null;
  radio: string | null;
  usb: string | null;
}

export interface FeaturesSpecs {
  sensors: string | null;
}

export interface BatterySpecs {
  batteryType: string | null;
  charging: string | null;
}

export interface MiscSpecs {
  colors: string | null;
  models: string | null;
  sar: string | null;
  sarEu: string | null;
  price: string | null;
}

/** A section is null when the page had no such category at all */
export interface NormalizedSpec {
  network: NetworkSpecs | null;
  launch: LaunchSpecs | null;
  body: BodySpecs | null;
  display: DisplaySpecs | null;
  platform: PlatformSpecs | null;
  memory: MemorySpecs | null;
  mainCamera: CameraSpecs | null;
  selfieCamera: CameraSpecs | null;
  sound: SoundSpecs | null;
  comms: CommsSpecs | null;
  features: FeaturesSpecs | null;
  battery: BatterySpecs | null;
  misc: MiscSpecs | null;
}

// ===== Persisted documents =====

export interface PhoneRecord extends NormalizedSpec {
  detailId: string;
  name: string;
  brand: string;
  url: string;
  thumbnailUrl: string | null;
  source: string;
  rawCategories: RawCategory[];
  firstSeenAt: string;
  lastUpdatedAt: string;
  version: number;
}

/** Phone-list entry backing the completion index */
export interface PhoneListEntry {
  detailId: string;
  name: string;
  brand: string;
  url: string;
  thumbnailUrl: string | null;
  isComplete: boolean;
  createdAt: string;
  updatedAt: string;
}

// ===== Run reporting =====

export interface RunStats {
  brandsTotal: number;
  brandsProcessed: number;
  brandsFailed: number;
  itemsFound: number;
  itemsInserted: number;
  itemsSkipped: number;
  itemsFailed: number;
  aborted: string | null;
  cancelled: boolean;
  initialCount: number;
  finalCount: number;
  durationMs: number;
}
