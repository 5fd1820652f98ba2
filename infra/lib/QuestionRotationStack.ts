import * as path from 'node:path';
import { Duration, RemovalPolicy, Stack, aws_logs as logs, CfnOutput } from 'aws-cdk-lib';
import type { StackProps } from 'aws-cdk-lib';
import type { Construct } from 'constructs';
import { Table, AttributeType, BillingMode } from 'aws-cdk-lib/aws-dynamodb';
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs';
import type { NodejsFunctionProps } from 'aws-cdk-lib/aws-lambda-nodejs';
import { Runtime, Tracing } from 'aws-cdk-lib/aws-lambda';
import { HttpApi, CorsHttpMethod, HttpMethod } from 'aws-cdk-lib/aws-apigatewayv2';
import { HttpLambdaIntegration } from 'aws-cdk-lib/aws-apigatewayv2-integrations';
import { Rule, Schedule } from 'aws-cdk-lib/aws-events';
import { LambdaFunction } from 'aws-cdk-lib/aws-events-targets';
import { Queue } from 'aws-cdk-lib/aws-sqs';
import {
  AwsCustomResource,
  AwsCustomResourcePolicy,
  PhysicalResourceId
} from 'aws-cdk-lib/custom-resources';

interface QuestionRotationStackProps extends StackProps {
  stage: string;
}

export class QuestionRotationStack extends Stack {
  constructor(scope: Construct, id: string, props: QuestionRotationStackProps) {
    super(scope, id, props);

    const appName = 'question-rotation';
    const stage = props.stage ?? 'dev';
    const rotationRate: string = this.node.tryGetContext('rotationRate') ?? '1 day';
    const cycleDuration: string = this.node.tryGetContext('cycleDuration') ?? '24h';

    const table = new Table(this, 'RotationTable', {
      tableName: `${appName}-${stage}-rotation`,
      partitionKey: { name: 'pk', type: AttributeType.STRING },
      sortKey: { name: 'sk', type: AttributeType.STRING },
      billingMode: BillingMode.PAY_PER_REQUEST,
      removalPolicy: RemovalPolicy.RETAIN,
      pointInTimeRecovery: true
    });

    const controlTable = new Table(this, 'ControlTable', {
      tableName: `${appName}-${stage}-control`,
      partitionKey: { name: 'pk', type: AttributeType.STRING },
      sortKey: { name: 'sk', type: AttributeType.STRING },
      billingMode: BillingMode.PAY_PER_REQUEST,
      removalPolicy: RemovalPolicy.DESTROY,
      timeToLiveAttribute: 'expiresAt'
    });

    const environment = {
      APP_NAME: appName,
      STAGE: stage,
      TABLE_NAME: table.tableName,
      CONTROL_TABLE_NAME: controlTable.tableName,
      LOG_LEVEL: 'INFO',
      POWERTOOLS_SERVICE_NAME: appName,
      POWERTOOLS_METRICS_NAMESPACE: appName,
      STORE_TIMEOUT_MS: '2000',
      CACHE_TIMEOUT_MS: '250',
      ROTATION_EARLY_TOLERANCE_SECONDS: '300'
    };

    const handlersDir = path.join(__dirname, '..', '..', 'packages', 'handlers', 'src');
    const shared: Partial<NodejsFunctionProps> = {
      handler: 'handler',
      runtime: Runtime.NODEJS_20_X,
      memorySize: 512,
      bundling: {
        minify: true,
        sourcesContent: false,
        target: 'node20'
      },
      environment,
      tracing: Tracing.ACTIVE,
      logRetention: logs.RetentionDays.ONE_WEEK
    };

    const lookupFunction = new NodejsFunction(this, 'LookupHandler', {
      ...shared,
      functionName: `${appName}-${stage}-lookup`,
      entry: path.join(handlersDir, 'lookup-handler.ts'),
      timeout: Duration.seconds(10)
    });

    const rotationDlq = new Queue(this, 'RotationDlq', {
      queueName: `${appName}-${stage}-rotation-dlq`,
      retentionPeriod: Duration.days(14),
      removalPolicy: RemovalPolicy.DESTROY
    });

    const rotationFunction = new NodejsFunction(this, 'RotationHandler', {
      ...shared,
      functionName: `${appName}-${stage}-rotation`,
      entry: path.join(handlersDir, 'rotation-handler.ts'),
      timeout: Duration.minutes(5),
      reservedConcurrentExecutions: 1
    });

    table.grantReadData(lookupFunction);
    controlTable.grantReadWriteData(lookupFunction);
    table.grantReadWriteData(rotationFunction);
    controlTable.grantReadWriteData(rotationFunction);

    new Rule(this, 'RotationSchedule', {
      ruleName: `${appName}-${stage}-rotation`,
      schedule: Schedule.expression(`rate(${rotationRate})`),
      targets: [
        new LambdaFunction(rotationFunction, {
          retryAttempts: 0,
          deadLetterQueue: rotationDlq
        })
      ]
    });

    new AwsCustomResource(this, 'CycleDurationParameter', {
      onCreate: {
        service: 'DynamoDB',
        action: 'putItem',
        parameters: {
          TableName: controlTable.tableName,
          Item: {
            pk: { S: 'CONFIG' },
            sk: { S: 'cycle-duration' },
            value: { S: cycleDuration }
          },
          ConditionExpression: 'attribute_not_exists(pk)'
        },
        physicalResourceId: PhysicalResourceId.of(`${appName}-${stage}-cycle-duration`),
        ignoreErrorCodesMatching: 'ConditionalCheckFailedException'
      },
      policy: AwsCustomResourcePolicy.fromSdkCalls({
        resources: [controlTable.tableArn]
      })
    });

    const api = new HttpApi(this, 'LookupApi', {
      apiName: `${appName}-${stage}`,
      corsPreflight: {
        allowHeaders: ['content-type'],
        allowMethods: [CorsHttpMethod.GET],
        allowOrigins: ['*']
      }
    });

    const integration = new HttpLambdaIntegration('LookupIntegration', lookupFunction);

    for (const routePath of ['/current-question', '/healthz', '/readyz']) {
      api.addRoutes({
        path: routePath,
        methods: [HttpMethod.GET],
        integration
      });
    }

    new CfnOutput(this, 'HttpApiUrl', {
      value: api.apiEndpoint
    });

    new CfnOutput(this, 'RotationTableName', {
      value: table.tableName
    });

    new CfnOutput(this, 'ControlTableName', {
      value: controlTable.tableName
    });
  }
}
