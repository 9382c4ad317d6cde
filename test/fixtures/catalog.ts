/** Catalog source objects shared by the profile tests. */

export const SWITCH_RECEIVER = 'SWITCH_VIRTUAL_RECEIVER';
export const DIMMER_RECEIVER = 'DIMMER_VIRTUAL_RECEIVER';
export const KEY_SENDER = 'KEY_TRANSCEIVER';
export const MOTION_SENDER = 'MOTION_DETECTOR_TRANSCEIVER';

export function MakeCatalogSource(): Record<string, unknown> {
    return {
        [SWITCH_RECEIVER]: {
            [KEY_SENDER]: {
                profiles: [
                    {
                        id: 1,
                        name: { en: 'Mode on', de: 'Modus ein' },
                        description: { en: 'Mode only' },
                        params: { MODE: { constraint_type: 'fixed', value: 'ON' } },
                    },
                    {
                        id: 2,
                        name: { en: 'Mode on at half level' },
                        params: {
                            MODE: { constraint_type: 'fixed', value: 'ON' },
                            LEVEL: { constraint_type: 'fixed', value: 50 },
                        },
                    },
                ],
            },
            [MOTION_SENDER]: { profiles: [] },
        },
        [DIMMER_RECEIVER]: {
            [KEY_SENDER]: {
                profiles: [
                    {
                        id: 3,
                        name: { de: 'Dimmer ein' },
                        description: { en: 'Dims up on short press', de: 'Dimmt bei kurzem Tastendruck hoch' },
                        params: {
                            SHORT_PROFILE_ACTION_TYPE: { constraint_type: 'fixed', value: 1 },
                            SHORT_JT_ON: { constraint_type: 'fixed', value: 3 },
                            SHORT_ON_TIME_BASE: { constraint_type: 'fixed', value: 7 },
                            SHORT_ON_TIME_FACTOR: { constraint_type: 'fixed', value: 2 },
                            SHORT_OFF_TIME_BASE: { constraint_type: 'fixed', value: 1 },
                            SHORT_ON_LEVEL: { constraint_type: 'range', min_value: 0, max_value: 1, default: 1 },
                            SHORT_RAMPON_TIME_FACTOR: { constraint_type: 'list', values: [0, 2, 5], default: 5 },
                        },
                    },
                    {
                        id: 4,
                        name: { en: 'Unconstrained' },
                        params: {},
                    },
                ],
            },
        },
    };
}
