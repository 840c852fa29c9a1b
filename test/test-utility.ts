// SPDX-License-Identifier: Apache-2.0

import {use} from 'chai';
import chaiAsPromised from 'chai-as-promised';
import {ContainerResource} from '../src/business/app-model/resource.js';

use(chaiAsPromised);

export class TestContainerResource extends ContainerResource {
  public constructor(name: string) {
    super(name);
  }
}
