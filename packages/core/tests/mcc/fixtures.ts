import { Collection } from '../../src/mcc/collection.js';
import { InMemoryDataSource, type InMemoryRecords } from '../../src/mcc/data-source.js';
import { resolveConfiguration } from '../../src/mcc/configuration.js';
import type { ConfigurationInput } from '../../src/types/index.js';

// Codes in ascending order; tests rely on this order
export function makeRecords(): InMemoryRecords {
    return {
        codes: [
            {
                mcc: '0742',
                iso_description: 'Veterinary Services',
                stripe_description: 'Veterinary Services',
                stripe_code: 'veterinary_services',
                irs_reportable: true,
            },
            { mcc: 763, iso_description: 'Agricultural Cooperatives', irs_reportable: true },
            { mcc: '1520', stripe_code: 'general_contractors' },
            { mcc: '3000', iso_description: 'United Airlines', irs_reportable: false },
            { mcc: '3351', iso_description: 'Affiliated Auto Rental' },
            { mcc: '4411', iso_description: 'Steamship and Cruise Lines', irs_reportable: false },
            {
                mcc: '4511',
                iso_description: 'Airlines and Air Carriers',
                stripe_code: 'airlines_air_carriers',
                irs_reportable: true,
            },
            {
                mcc: '5411',
                iso_description: 'Grocery Stores, Supermarkets',
                usda_description: 'Grocery Stores',
                stripe_description: 'Grocery Stores and Supermarkets',
                stripe_code: 'grocery_stores_supermarkets',
                visa_description: 'Grocery Stores, Supermarkets',
                visa_clearing_name: 'GROCERY',
                mastercard_description: 'Grocery Stores',
                amex_description: 'Grocery Stores',
                alipay_description: 'Grocery stores',
                irs_description: 'Grocery Stores and Supermarkets',
                irs_reportable: true,
            },
            {
                mcc: '5499',
                iso_description: 'Miscellaneous Food Stores - Convenience Stores and Specialty Markets',
                irs_reportable: false,
            },
            {
                mcc: '5812',
                iso_description: 'Eating Places, Restaurants',
                stripe_code: 'eating_places_restaurants',
                irs_reportable: true,
            },
            { mcc: '6011', iso_description: 'Automated Cash Disbursements', irs_reportable: false },
            { mcc: '7800', iso_description: 'Government-Owned Lotteries (US Region only)' },
            { mcc: '7801', iso_description: 'Government Licensed On-Line Casinos (On-Line Gambling)' },
            { mcc: '7802', iso_description: 'Government-Licensed Horse/Dog Racing' },
            {
                mcc: '7995',
                iso_description: 'Betting, including Lottery Tickets, Casino Gaming Chips',
                stripe_code: 'betting_casino_gambling',
                irs_reportable: false,
            },
            { mcc: '8011', usda_description: 'Doctors', amex_description: 'Doctors and Physicians' },
            { mcc: '9406', iso_description: 'Government-Owned Lotteries (Non-U.S. region)' },
        ],
        ranges: [
            { start: '0000', end: '0699', name: 'Reserved for ISO Use', reserved: true },
            { start: '0700', end: '0999', name: 'Agricultural Services' },
            { start: '1000', end: '1499', name: 'Reserved for Future Use', reserved: true },
            { start: '1500', end: '2999', name: 'Contracted Services' },
            { start: '3000', end: '3299', name: 'Airlines' },
            { start: '3300', end: '3499', name: 'Car Rental' },
            { start: '3500', end: '3999', name: 'Lodging' },
            { start: '4000', end: '4799', name: 'Transportation Services' },
            { start: '4800', end: '4999', name: 'Utility Services' },
            { start: 5000, end: 5599, name: 'Retail Outlet Services' },
            { start: '5600', end: '5699', name: 'Clothing Stores' },
            { start: '5700', end: '7299', name: 'Miscellaneous Stores' },
            { start: '7300', end: '7999', name: 'Business Services' },
            { start_code: '8000', end_code: '8999', name: 'Professional Services and Membership Organizations' },
            { start: '9000', end: '9999', name: 'Government Services' },
        ],
        categories: {
            gambling: {
                name: 'Gambling',
                description: 'Betting, lotteries and casinos',
                codes: ['7800', '7801', '7802', '7995', '9406'],
            },
            airlines: {
                name: 'Airlines',
                description: 'Air carriers',
                codes: ['3000-3350', '4415', '4511'],
            },
            healthcare: {
                name: 'Healthcare',
                codes: ['8011', '8021', '8062', '8099'],
            },
            cash_advance: {
                name: 'Cash Advance',
                codes: [6010, 6011],
            },
            food: {
                name: 'Food and Grocery',
                codes: ['5411', '5499', '5811-5814'],
            },
        },
    };
}

export function makeCollection(config: ConfigurationInput = {}, records: InMemoryRecords = makeRecords()): Collection {
    return new Collection(new InMemoryDataSource(records), resolveConfiguration(config));
}

export function mccs(codes: ReadonlyArray<{ mcc: string }>): string[] {
    return codes.map((c) => c.mcc);
}
