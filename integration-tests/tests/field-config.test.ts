/**
 * Field Configuration Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  parseFieldConfig,
  parseFieldType,
  loadFieldConfig,
  toFieldConfigRow,
  validateFieldConfig,
  FieldConfigError,
} from '@facesheet/shared';

describe('parseFieldType', () => {
  it('should recognise Name', () => {
    expect(parseFieldType('Name')).toBe('Name');
  });

  it('should treat anything else as Plain', () => {
    expect(parseFieldType('Plain')).toBe('Plain');
    expect(parseFieldType('name')).toBe('Plain');
    expect(parseFieldType('Date')).toBe('Plain');
  });
});

describe('parseFieldConfig', () => {
  it('should map rows to field specs in order', () => {
    const specs = parseFieldConfig([
      { label: 'Name', max_horizontal_distance: 400, field_type: 'Name' },
      { label: 'Visit', max_horizontal_distance: 150, field_type: 'Plain' },
      { label: 'DOB', max_horizontal_distance: 200, field_type: 'Date' },
    ]);

    expect(specs).toEqual([
      { label: 'Name', maxHorizontalDistance: 400, fieldType: 'Name' },
      { label: 'Visit', maxHorizontalDistance: 150, fieldType: 'Plain' },
      { label: 'DOB', maxHorizontalDistance: 200, fieldType: 'Plain' },
    ]);
  });

  it('should reject a row with a missing column', () => {
    const rows = [{ label: 'Visit', field_type: 'Plain' }];

    expect(() => parseFieldConfig(rows)).toThrow(FieldConfigError);
    expect(() => parseFieldConfig(rows)).toThrow(
      "Invalid field configuration: /0: must have required property 'max_horizontal_distance'"
    );
  });

  it('should reject a distance that is not an integer', () => {
    const rows = [{ label: 'Visit', max_horizontal_distance: '150', field_type: 'Plain' }];

    expect(() => parseFieldConfig(rows)).toThrow(FieldConfigError);
  });

  it('should reject configuration that is not an array', () => {
    expect(() => parseFieldConfig({ label: 'Visit' })).toThrow(FieldConfigError);
  });

  it('should round-trip a spec back to a configuration row', () => {
    expect(toFieldConfigRow({ label: 'MR', maxHorizontalDistance: 150, fieldType: 'Plain' })).toEqual({
      label: 'MR',
      max_horizontal_distance: 150,
      field_type: 'Plain',
    });
  });
});

describe('validateFieldConfig', () => {
  it('should list every error', () => {
    const result = validateFieldConfig([{ label: '', max_horizontal_distance: 0, field_type: 'Plain' }]);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      '/0/label: must NOT have fewer than 1 characters',
      '/0/max_horizontal_distance: must be > 0',
    ]);
  });
});

describe('loadFieldConfig', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'facesheet-config-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should load the default configuration shipped with the project', () => {
    const specs = loadFieldConfig(path.join(__dirname, '../../config/fields.json'));

    expect(specs.map(s => s.label)).toEqual(['Name', 'Visit', 'MR', 'DOB', 'Age', 'Sex', 'SSN']);
    expect(specs[0].fieldType).toBe('Name');
  });

  it('should load a configuration file', () => {
    const filePath = path.join(tmpDir, 'fields.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify([{ label: 'Age', max_horizontal_distance: 80, field_type: 'Plain' }])
    );

    expect(loadFieldConfig(filePath)).toEqual([
      { label: 'Age', maxHorizontalDistance: 80, fieldType: 'Plain' },
    ]);
  });

  it('should fail on a missing file', () => {
    expect(() => loadFieldConfig(path.join(tmpDir, 'absent.json'))).toThrow(FieldConfigError);
  });

  it('should fail on malformed JSON', () => {
    const filePath = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(filePath, '[{ "label": ');

    expect(() => loadFieldConfig(filePath)).toThrow(/^Cannot read field configuration/);
  });
});
