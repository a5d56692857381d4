import { describe, expect, it } from 'vitest';

import { isPrivate } from './privacy.js';

describe('isPrivate', () => {
  it('matches keywords anywhere, ignoring case', () => {
    expect(isPrivate('Mi PASSWORD es test-secret')).toBe(true);
    expect(isPrivate('Vive en la dirección de siempre')).toBe(true);
    expect(isPrivate('Toma su medicamento a las ocho')).toBe(true);
  });

  it('over-blocks words that merely contain a keyword', () => {
    expect(isPrivate('Le regalaron una tarjeta de cumpleaños')).toBe(true);
  });

  it('lets ordinary facts through', () => {
    expect(isPrivate('Le gusta el café con leche')).toBe(false);
  });
});
