#!/usr/bin/env node
import 'source-map-support/register.js';
import { App } from 'aws-cdk-lib';
import { QuestionRotationStack } from '../lib/QuestionRotationStack';

const app = new App();
const stage = app.node.tryGetContext('stage') ?? process.env.STAGE ?? 'dev';

new QuestionRotationStack(app, `QuestionRotationStack-${stage}`, {
  stage
});
