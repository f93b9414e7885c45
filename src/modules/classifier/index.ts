import { Availability } from '../../types';

// Registry phrasings for "nothing registered under this name".
const AVAILABLE_INDICATORS = [
    'no match',
    'not found',
    'no entries found',
    'no data found',
    'available for registration',
    'status: free',
];

const TAKEN_INDICATORS = [
    'domain name:',
    'registrar:',
    'creation date:',
    'expiration date:',
    'updated date:',
];

export class AvailabilityClassifier {

    /**
     * Best-effort verdict from raw directory text. Available indicators win
     * over taken ones; text matching neither is reported as taken.
     */
    static classify(rawText: string): Availability {
        const text = rawText.toLowerCase();

        if (AVAILABLE_INDICATORS.some((indicator) => text.includes(indicator))) {
            return Availability.AVAILABLE;
        }
        if (TAKEN_INDICATORS.some((indicator) => text.includes(indicator))) {
            return Availability.TAKEN;
        }
        return Availability.TAKEN;
    }
}
