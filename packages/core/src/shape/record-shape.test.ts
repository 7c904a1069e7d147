import { describe, it, expect } from 'vitest';
import { RecordShape, defineShape } from './record-shape.js';
import { PERSON_SHAPE, ANN, BO } from '../../test/fixtures/people.js';

interface Profile {
  Handle: string;
  Nickname?: string;
  Tags: string[];
}

const PROFILE_SHAPE = defineShape<Profile>([
  { field: 'Handle', kind: 'text' },
  { field: 'Nickname', header: 'nick', kind: 'text' },
  { field: 'Tags', kind: 'composite' },
]);

describe('RecordShape', () => {
  describe('headers', () => {
    it('uses the display override when present, else the field name', () => {
      expect(PERSON_SHAPE.headers()).toEqual(['full_name', 'Age', 'Score', 'Active']);
    });

    it('keeps declaration order', () => {
      expect(PERSON_SHAPE.fields().map((descriptor) => descriptor.field)).toEqual([
        'Name',
        'Age',
        'Score',
        'Active',
      ]);
    });

    it('does not depend on any record', () => {
      const before = PERSON_SHAPE.headers();
      PERSON_SHAPE.row(ANN);
      PERSON_SHAPE.row(BO);

      expect(PERSON_SHAPE.headers()).toEqual(before);
    });
  });

  describe('row', () => {
    it('stringifies each field by its kind', () => {
      expect(PERSON_SHAPE.row(ANN)).toEqual(['Ann', '30', '91.46', 'true']);
      expect(PERSON_SHAPE.row(BO)).toEqual(['Bo', '4', '7.00', 'false']);
    });

    it('has one cell per header', () => {
      expect(PERSON_SHAPE.row(ANN)).toHaveLength(PERSON_SHAPE.headers().length);
    });

    it('leaves a missing field as an empty cell', () => {
      expect(PROFILE_SHAPE.row({ Handle: 'ann', Tags: [] })).toEqual(['ann', '', '']);
    });

    it('marks a present but undefined field as invalid', () => {
      expect(PROFILE_SHAPE.row({ Handle: 'ann', Nickname: undefined, Tags: [] })).toEqual([
        'ann',
        '<invalid Value>',
        '',
      ]);
    });

    it('reads getters declared on a class', () => {
      class Account {
        constructor(private readonly cents: number) {}

        get Balance(): number {
          return this.cents / 100;
        }
      }
      const shape = defineShape<Account>([{ field: 'Balance', kind: 'float' }]);

      expect(shape.row(new Account(1050))).toEqual(['10.50']);
    });
  });

  it('copies the descriptor list at construction', () => {
    const descriptors: { field: 'Handle'; kind: 'text' }[] = [{ field: 'Handle', kind: 'text' }];
    const shape = new RecordShape<Profile>(descriptors);
    descriptors.push({ field: 'Handle', kind: 'text' });

    expect(shape.headers()).toEqual(['Handle']);
  });
});
