export type DrumStatus = 'ACTIVE' | 'COMPLETED';

export type CompleteType = 'FULL' | 'INCOMPLETE';

export interface Material {
  materialCode: string;
  description: string;
  maxQty: number;
  prefix: string;
  allowIncomplete: boolean;
  active: boolean;
}

export interface Drum {
  drumNumber: string;
  drumType: string;
  materialCode: string;
  standardQty: string;
  status: DrumStatus;
  palletId: string;
  timestamp: string;
  operator: string;
  deviceId: string;
}

export interface Pallet {
  palletId: string;
  materialCode: string;
  description: string;
  createdAt: string;
  count: number;
  completeType: CompleteType;
  emailSubject: string;
  emailBody: string;
}

export interface Settings {
  globalPalletCounter: number;
  reportEmail: string;
}

export interface ParsedScan {
  raw: string;
  drumType: string;
  drumNumber: string;
}

export type PalletState = 'EMPTY' | 'IN_PROGRESS' | 'FULL';

export interface MaterialStatus {
  material: Material;
  count: number;
  state: PalletState;
  canGenerateFull: boolean;
  canGenerateIncomplete: boolean;
}

export type UndoResult =
  | { removed: true; drum: Drum }
  | { removed: false };

export type Clock = () => Date;

export interface AppendDrumInput {
  material: Material;
  labelMaterialCode: string;
  drumNumber: string;
  drumType: string;
  standardQty: string;
  operator: string;
  deviceId: string;
}
