import { EnumValueError } from './errors';

// Operation mode of the indoor unit
export enum Mode {
    Auto = 'Auto',
    Cool = 'Cool',
    Dry = 'Dry',
    Fan = 'Fan',
    Heat = 'Heat',
}

export enum Fan {
    Auto = 'Auto',
    Low = 'Low',
    Med = 'Med',
    High = 'High',
}

// Horizontal (left-right) louver
export enum HGuide {
    Closed = 'Closed',
    SwingLeftRight = 'SwingLeftRight',
    Left = 'Left',
    MidLeft = 'MidLeft',
    Mid = 'Mid',
    MidRight = 'MidRight',
    Right = 'Right',
    Out = 'Out',
    SwingInOut = 'SwingInOut',
}

// Vertical (up-down) louver
export enum VGuide {
    Closed = 'Closed',
    SwingUpDown = 'SwingUpDown',
    Up = 'Up',
    MidUp = 'MidUp',
    Mid = 'Mid',
    MidDown = 'MidDown',
    Down = 'Down',
    SwingDown = 'SwingDown',
    SwingMid = 'SwingMid',
    SwingUp = 'SwingUp',
}

// Temperature shown on the indoor unit display
export enum TempDisplay {
    Default = 'Default',
    Set = 'Set',
    Room = 'Room',
    Outdoor = 'Outdoor',
}

const modes = new Map<number, Mode>([
    [0, Mode.Auto],
    [1, Mode.Cool],
    [2, Mode.Dry],
    [3, Mode.Fan],
    [4, Mode.Heat],
]);

const fans = new Map<number, Fan>([
    [0, Fan.Auto],
    [1, Fan.Low],
    [2, Fan.Med],
    [3, Fan.High],
]);

const hGuides = new Map<number, HGuide>([
    [0, HGuide.Closed],
    [1, HGuide.SwingLeftRight],
    [2, HGuide.Left],
    [3, HGuide.MidLeft],
    [4, HGuide.Mid],
    [5, HGuide.MidRight],
    [6, HGuide.Right],
    [12, HGuide.Out],
    [13, HGuide.SwingInOut],
]);

const vGuides = new Map<number, VGuide>([
    [0, VGuide.Closed],
    [1, VGuide.SwingUpDown],
    [2, VGuide.Up],
    [3, VGuide.MidUp],
    [4, VGuide.Mid],
    [5, VGuide.MidDown],
    [6, VGuide.Down],
    [7, VGuide.SwingDown],
    [9, VGuide.SwingMid],
    [11, VGuide.SwingUp],
]);

const tempDisplays = new Map<number, TempDisplay>([
    [0, TempDisplay.Default],
    [1, TempDisplay.Set],
    [2, TempDisplay.Room],
    [3, TempDisplay.Outdoor],
]);

const swingingGuides: ReadonlySet<HGuide | VGuide> = new Set<HGuide | VGuide>([
    HGuide.SwingLeftRight,
    HGuide.SwingInOut,
    VGuide.SwingUpDown,
    VGuide.SwingDown,
    VGuide.SwingMid,
    VGuide.SwingUp,
]);

function lookup<T>(table: ReadonlyMap<number, T>, enumName: string, raw: number): T {
    const value = table.get(raw);
    if (value === undefined) { throw new EnumValueError(enumName, raw); }
    return value;
}

export const toMode = (raw: number) => lookup(modes, 'Mode', raw);
export const toFan = (raw: number) => lookup(fans, 'Fan', raw);
export const toHGuide = (raw: number) => lookup(hGuides, 'HGuide', raw);
export const toVGuide = (raw: number) => lookup(vGuides, 'VGuide', raw);
export const toTempDisplay = (raw: number) => lookup(tempDisplays, 'TempDisplay', raw);

export function isSwinging(guide: HGuide | VGuide) {
    return swingingGuides.has(guide);
}
