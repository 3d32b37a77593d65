/**
 * End-to-end: a typed document type written to and read from disk.
 */

import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { BoolField, DateTimeField, IntField, TextField, defineDocument, tagSequence, TagField } from '../index.js';
import type { DocumentOf } from '../index.js';
import { removeTempDirs, tempPath } from './helpers.js';

afterEach(removeTempDirs);

const Person = defineDocument({
  name: new TextField({ required: true }),
  age: new IntField(),
  employed: new BoolField(),
  married_at: new DateTimeField(),
  tags: new TagField().addValidator(tagSequence),
});

type Person = DocumentOf<typeof Person>;

describe('Person document', () => {
  it('saves a new document', () => {
    const person: Person = Person.create({ name: 'John Smith' });
    person.set('age', 32);
    person.set('employed', false);
    person.set('married_at', new Date(2011, 10, 13, 13, 30));
    person.write('Hello, John!');
    person.validate();

    const path = tempPath();
    person.save(path);
    assert.equal(
      readFileSync(path, 'utf-8'),
      'name: John Smith\n' +
        'age: 32\n' +
        'employed: false\n' +
        'married_at: 2011-11-13 13:30:00\n' +
        '\n' +
        'Hello, John!\n',
    );
  });

  it('opens an existing document', () => {
    const path = tempPath(
      'name: Jane Doe\n' +
        'age: 28\n' +
        'employed: True\n' +
        'married_at: 2000-01-02 07:10:59\n' +
        'tags: friend, colleague\n' +
        '\n' +
        'Hello, Jane!\n',
    );
    const person = Person.open(path);
    assert.equal(person.get('name'), 'Jane Doe');
    assert.equal(person.get('age'), 28);
    assert.equal(person.get('employed'), true);
    assert.deepEqual(person.get('married_at'), new Date(2000, 0, 2, 7, 10, 59));
    assert.deepEqual(person.get('tags'), ['friend', 'colleague']);
    assert.equal(person.read(), 'Hello, Jane!\n');
    assert.doesNotThrow(() => person.validate());
  });

  it('edits an opened document in place', () => {
    const path = tempPath('name: Jane Doe\nage: 28\n\nHello, Jane!\n');
    const person = Person.open(path);
    person.set('age', 29);
    person.set('tags', ['birthday']);
    person.save();
    assert.equal(
      readFileSync(path, 'utf-8'),
      'name: Jane Doe\nage: 29\ntags: birthday\n\nHello, Jane!\n',
    );
  });
});
