/**
 * Reference world whose classes mirror reflection-dump.json
 * 类结构与 reflection-dump.json 对应的参考世界
 */

import { InstanceWorld } from '../../src/core/InstanceWorld';
import { BrickColor } from '../../src/datatypes/BrickColor';
import { CFrame } from '../../src/datatypes/CFrame';
import { Color3 } from '../../src/datatypes/Color3';
import { EnumItem } from '../../src/datatypes/EnumItem';
import { Font } from '../../src/datatypes/Font';
import { NumberRange } from '../../src/datatypes/NumberRange';
import { NumberSequence } from '../../src/datatypes/NumberSequence';
import { UDim2 } from '../../src/datatypes/UDim2';
import { Vector3 } from '../../src/datatypes/Vector3';
import dump from './reflection-dump.json';

export const reflectionDump: unknown = dump;

export const PLASTIC = new EnumItem('Material', 'Plastic', 256);
export const NEON = new EnumItem('Material', 'Neon', 288);
export const REGULAR = new EnumItem('FontWeight', 'Regular', 400);
export const BOLD = new EnumItem('FontWeight', 'Bold', 700);
export const NORMAL = new EnumItem('FontStyle', 'Normal', 0);
export const ITALIC = new EnumItem('FontStyle', 'Italic', 1);

export function createWorld(): InstanceWorld {
  return new InstanceWorld()
    .defineClass({ name: 'Instance', creatable: false, properties: { Name: '', Archivable: true } })
    .defineClass({ name: 'Workspace', superclass: 'Instance' })
    .defineClass({ name: 'Group', superclass: 'Instance' })
    .defineClass({ name: 'Terrain', superclass: 'Instance' })
    .defineClass({ name: 'Leaf', superclass: 'Instance', properties: { X: 0, LinkedLeaf: undefined } })
    // unset readings start out as NaN
    .defineClass({
      name: 'Gauge',
      superclass: 'Instance',
      properties: { Reading: NaN, Offset: new Vector3(NaN, 0, 0), Dial: Color3.fromRGB(0, 0, 0) }
    })
    .defineClass({
      name: 'Part',
      superclass: 'Instance',
      properties: {
        Anchored: false,
        Size: new Vector3(4, 1, 2),
        CFrame: CFrame.identity,
        BrickColor: BrickColor.named('Medium stone grey'),
        Color: Color3.fromRGB(163, 162, 165),
        Material: PLASTIC,
        CustomPhysicalProperties: null,
        Transparency: 0,
        Secret: '',
        Velocity: Vector3.zero,
        Mystery: null,
        Attachment0: undefined
      }
    })
    .defineClass({
      name: 'GuiObject',
      superclass: 'Instance',
      creatable: false,
      properties: { Size: UDim2.fromScalars(0, 100, 0, 100), Visible: true }
    })
    .defineClass({
      name: 'TextLabel',
      superclass: 'GuiObject',
      properties: { Text: 'Label', FontFace: new Font('Source Sans', REGULAR, NORMAL), TextTransparency: 0 }
    })
    .defineClass({
      name: 'ParticleEmitter',
      superclass: 'Instance',
      properties: { Transparency: NumberSequence.constant(0), Lifetime: new NumberRange(5, 10) }
    });
}
