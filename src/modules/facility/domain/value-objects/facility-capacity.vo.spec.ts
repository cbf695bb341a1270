import { FacilityCapacity } from './facility-capacity.vo';

describe('FacilityCapacity', () => {
    it('starts fully available', () => {
        const capacity = FacilityCapacity.create(4);

        expect(capacity.available).toBe(4);
        expect(capacity.occupied).toBe(0);
        expect(capacity.isFull).toBe(false);
    });

    it.each([
        [-1, 0, 'Total capacity must be a non-negative integer'],
        [2.5, 1, 'Total capacity must be a non-negative integer'],
        [3, -1, 'Available capacity must be a non-negative integer'],
        [3, 4, 'Available capacity cannot exceed total capacity'],
    ])('rejects total %p with available %p', (total, available, message) => {
        expect(() => FacilityCapacity.create(total, available)).toThrow(message);
    });

    it('reserves down to zero and no further', () => {
        const full = FacilityCapacity.create(2).reserve().reserve();

        expect(full.available).toBe(0);
        expect(full.isFull).toBe(true);
        expect(() => full.reserve()).toThrow('No capacity left to reserve');
    });

    it('never releases past the total', () => {
        const capacity = FacilityCapacity.create(2, 1);

        expect(capacity.release().available).toBe(2);
        expect(capacity.release().release().available).toBe(2);
    });

    it('keeps occupied spaces when the total changes', () => {
        const capacity = FacilityCapacity.create(10, 4);

        expect(capacity.withTotal(12).available).toBe(6);
        expect(capacity.withTotal(6).available).toBe(0);
        expect(capacity.withTotal(3)).toEqual(FacilityCapacity.create(3, 0));
    });
});
