import { Name, Priority, ProductPreference, Tag } from '@client-registry/model';
import { ALICE, ClientBuilder } from '@client-registry/model/testing';
import { EditField, applyEdit, createEditDescriptor, isAnyFieldEdited } from './edit-descriptor';

describe('EditClientDescriptor', () => {
  it('should leave every field unset by default', () => {
    const descriptor = createEditDescriptor();
    expect(isAnyFieldEdited(descriptor)).toBe(false);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(applyEdit(ALICE, descriptor).equals(ALICE)).toBe(true);
  });

  it('should count a cleared field as edited', () => {
    expect(isAnyFieldEdited(createEditDescriptor({ priority: EditField.clear }))).toBe(true);
  });

  describe('applyEdit', () => {
    it('should keep the priority when it is not mentioned', () => {
      const edited = applyEdit(ALICE, createEditDescriptor({ name: EditField.set(Name.create('Alice Tan')) }));
      expect(edited.name.fullName).toBe('Alice Tan');
      expect(edited.priority?.level).toBe(3);
    });

    it('should clear the priority when asked to', () => {
      const edited = applyEdit(ALICE, createEditDescriptor({ priority: EditField.clear }));
      expect(edited.equals(ClientBuilder.from(ALICE).withoutPriority().build())).toBe(true);
    });

    it('should set a new priority', () => {
      const edited = applyEdit(ALICE, createEditDescriptor({ priority: EditField.set(Priority.fromLevel(1)) }));
      expect(edited.priority?.level).toBe(1);
    });

    it('should clear tags to an empty set', () => {
      expect(applyEdit(ALICE, createEditDescriptor({ tags: EditField.clear })).tags).toEqual([]);
    });

    it('should replace tags', () => {
      const edited = applyEdit(ALICE, createEditDescriptor({ tags: EditField.set([Tag.create('vip')]) }));
      expect(edited.tags.map((tag) => tag.tagName)).toEqual(['vip']);
    });

    it('should recompute the total purchase from a new preference', () => {
      const edited = applyEdit(
        ALICE,
        createEditDescriptor({ productPreference: EditField.set(ProductPreference.of('Soap')) }),
      );
      expect(edited.productPreference?.label).toBe('Soap');
      expect(edited.totalPurchase).toBe(1);
    });

    it('should keep the identity unless an identity field changes', () => {
      expect(ALICE.isSameClient(applyEdit(ALICE, createEditDescriptor({ tags: EditField.clear })))).toBe(true);
      expect(
        ALICE.isSameClient(applyEdit(ALICE, createEditDescriptor({ name: EditField.set(Name.create('Alice Tan')) }))),
      ).toBe(false);
    });
  });
});
