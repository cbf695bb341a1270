import { AccessCode } from './access-code.vo';

describe('AccessCode', () => {
    it('generates six digits, keeping leading zeros', () => {
        for (let i = 0; i < 50; i++) {
            expect(AccessCode.generate().value).toMatch(/^\d{6}$/);
        }
    });

    it('rejects anything but six digits', () => {
        expect(() => AccessCode.create('12345')).toThrow('Access code must be exactly six digits');
        expect(() => AccessCode.create('12345a')).toThrow('Access code must be exactly six digits');
    });

    it('matches only the exact code', () => {
        const code = AccessCode.create('007341');

        expect(code.matches('007341')).toBe(true);
        expect(code.matches('7341')).toBe(false);
        expect(code.matches('007342')).toBe(false);
        expect(code.matches('')).toBe(false);
    });
});
